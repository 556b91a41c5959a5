import { EventEmitter } from 'events';
import type { Target } from './rules/types.js';

const MAX_EXCHANGES = 500;

export type ExchangeOutcome = 'pending' | 'forwarded' | 'aborted' | 'failed' | 'cancelled';

export interface ExchangeEntry {
  id: number;
  method: string;
  url: string;
  requestRule: string | null;
  responseRule: string | null;
  status: number | null;
  outcome: ExchangeOutcome;
  duration: number | null;
  timestamp: Date;
}

export interface ProxyStats {
  exchanges: number;
  requestRulesApplied: number;
  responseRulesApplied: number;
  aborted: number;
  failed: number;
  cancelled: number;
}

function emptyStats(): ProxyStats {
  return {
    exchanges: 0,
    requestRulesApplied: 0,
    responseRulesApplied: 0,
    aborted: 0,
    failed: 0,
    cancelled: 0,
  };
}

class Store extends EventEmitter {
  exchanges = new Map<number, ExchangeEntry>();
  exchangeId = 0;
  stats: ProxyStats = emptyStats();
  proxyRunning = false;
  proxyPort = 0;

  nextId() {
    return ++this.exchangeId;
  }

  addExchange(entry: ExchangeEntry) {
    this.exchanges.set(entry.id, entry);
    this.stats.exchanges++;
    while (this.exchanges.size > MAX_EXCHANGES) {
      const oldest = this.exchanges.keys().next();
      if (oldest.done) break;
      this.exchanges.delete(oldest.value);
    }
    this.emit('exchange', entry);
    this.emit('change');
  }

  updateExchange(id: number, updates: Partial<ExchangeEntry>) {
    const entry = this.exchanges.get(id);
    if (entry) {
      Object.assign(entry, updates);
      this.emit('change');
    }
  }

  /** Records the final outcome and bumps the matching counters. */
  finishExchange(id: number, outcome: Exclude<ExchangeOutcome, 'pending'>, updates: Partial<ExchangeEntry> = {}) {
    if (outcome === 'aborted') this.stats.aborted++;
    if (outcome === 'failed') this.stats.failed++;
    if (outcome === 'cancelled') this.stats.cancelled++;
    this.updateExchange(id, { ...updates, outcome });
  }

  recordRuleApplied(target: Target) {
    if (target === 'request') {
      this.stats.requestRulesApplied++;
    } else {
      this.stats.responseRulesApplied++;
    }
  }

  getExchange(id: number) {
    return this.exchanges.get(id);
  }

  getExchanges() {
    return Array.from(this.exchanges.values());
  }

  clearExchanges() {
    this.exchanges.clear();
    this.emit('change');
  }

  resetStats() {
    this.stats = emptyStats();
    this.emit('change');
  }

  setProxyRunning(running: boolean, port?: number) {
    this.proxyRunning = running;
    this.proxyPort = port ?? this.proxyPort;
    this.emit('change');
  }
}

export const store = new Store();

export function createExchangeEntry(id: number, method: string, url: string): ExchangeEntry {
  return {
    id,
    method,
    url,
    requestRule: null,
    responseRule: null,
    status: null,
    outcome: 'pending',
    duration: null,
    timestamp: new Date(),
  };
}
