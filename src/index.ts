import { Command } from 'commander';
import chalk from 'chalk';
import { startProxy } from './proxy.js';
import { startApiServer } from './api-server.js';
import { RuleLoader } from './rules/rule-loader.js';
import { errorMessage } from './errors.js';
import { setLogLevel } from './logger.js';

interface CliOptions {
  port?: string;
  host: string;
  apiPort?: string;
  watch: boolean;
  verbose?: boolean;
}

const program = new Command('fault-proxy');

program
  .description('HTTP proxy that delays, rewrites or aborts traffic matching declarative rules')
  .argument('<config>', 'Rule file (.json, .yaml or .yml)')
  .option('-p, --port <number>', 'Listen port (overrides listen_port)')
  .option('-H, --host <address>', 'Listen address', '127.0.0.1')
  .option('-a, --api-port <number>', 'Start the admin API on this port')
  .option('--no-watch', 'Do not reload rules when the file changes')
  .option('-v, --verbose', 'Log every applied action')
  .parse(process.argv);

const opts = program.opts<CliOptions>();
const [configPath] = program.args;

async function main() {
  if (opts.verbose) setLogLevel('debug');

  const loader = new RuleLoader(configPath);
  let port: number;

  try {
    const config = loader.start({ watch: opts.watch });
    port = opts.port ? parseInt(opts.port) : config.listenPort;

    console.log(chalk.cyan.bold('\n  fault-proxy'));
    console.log(chalk.gray(`  Loaded ${config.rules.length} rule(s) from ${loader.configPath}`));
    if (config.proxyPorts.length > 0) {
      console.log(chalk.gray(`  Intercepting destination ports: ${config.proxyPorts.join(', ')}`));
    }
  } catch (err) {
    console.error(chalk.red(`\n  ✗ ${errorMessage(err)}\n`));
    process.exit(1);
  }

  try {
    const server = await startProxy(loader, port, opts.host);
    console.log(`  Proxy running on http://${opts.host}:${port}`);

    const api = opts.apiPort ? startApiServer(loader, parseInt(opts.apiPort)) : null;
    if (opts.apiPort) {
      console.log(`  API server on http://127.0.0.1:${opts.apiPort}`);
    }
    console.log(chalk.gray('  Press Ctrl+C to stop.\n'));

    const shutdown = () => {
      console.log('\n  Shutting down...');
      server.close();
      api?.close();
      loader.stop().then(
        () => process.exit(0),
        () => process.exit(1),
      );
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code === 'EADDRINUSE') {
      console.error(`\n  ✗ Port ${port} is already in use.`);
      console.error(`    Try: fault-proxy ${configPath} -p ${port + 1}\n`);
    } else {
      console.error('  ✗ Failed to start:', error.message);
    }
    process.exit(1);
  }
}

main().catch((err) => {
  console.error(chalk.red('  ✗ Unexpected error:'), errorMessage(err));
  process.exit(1);
});
