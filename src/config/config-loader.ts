import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, errorMessage } from '../errors.js';
import { parseConfig, type Config } from './schema.js';

function decode(content: string, ext: string, filePath: string): unknown {
  try {
    switch (ext) {
      case '.json':
        return JSON.parse(content);
      case '.yaml':
      case '.yml':
        return parseYaml(content);
    }
  } catch (err) {
    throw new ConfigError(`cannot parse: ${errorMessage(err)}`, filePath);
  }
  throw new ConfigError(`invalid file extension "${ext}" (expected .json, .yaml or .yml)`, filePath);
}

/** Reads and validates a JSON or YAML rule file, chosen by extension. */
export function loadConfigFile(filePath: string): Config {
  const ext = path.extname(filePath).toLowerCase();

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new ConfigError(`cannot read: ${errorMessage(err)}`, filePath);
  }

  return parseConfig(decode(content, ext, filePath), filePath);
}
