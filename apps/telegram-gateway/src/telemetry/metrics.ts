import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export interface GatewayMetrics {
  registry: Registry;
  requestCounter: Counter<string>;
  requestDuration: Histogram<string>;
  agentRunFailures: Counter<string>;
  updateFailures: Counter<string>;
  outboundMessages: Counter<string>;
  commandCounter: Counter<string>;
  knowledgeRequests: Counter<string>;
  knowledgeCacheLookups: Counter<string>;
}

export interface MetricsOptions {
  prefix?: string;
  registry?: Registry;
}

export function createMetrics(options: MetricsOptions = {}): GatewayMetrics {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? 'telegram_gateway_';

  collectDefaultMetrics({ register: registry, prefix });

  const requestCounter = new Counter({
    name: `${prefix}requests_total`,
    help: 'Total number of webhook requests processed',
    labelNames: ['method', 'status'],
    registers: [registry],
  });

  const requestDuration = new Histogram({
    name: `${prefix}request_duration_seconds`,
    help: 'Webhook request duration in seconds',
    labelNames: ['method', 'status'],
    buckets: [0.1, 0.25, 0.5, 1, 2, 5, 15],
    registers: [registry],
  });

  const agentRunFailures = new Counter({
    name: `${prefix}agent_run_failures_total`,
    help: 'Agent run calls that failed or timed out',
    labelNames: ['reason'],
    registers: [registry],
  });

  const updateFailures = new Counter({
    name: `${prefix}update_failures_total`,
    help: 'Telegram updates whose processing threw',
    labelNames: ['kind'],
    registers: [registry],
  });

  const outboundMessages = new Counter({
    name: `${prefix}outbound_messages_total`,
    help: 'Total Telegram messages sent by the gateway',
    labelNames: ['kind', 'status'],
    registers: [registry],
  });

  const commandCounter = new Counter({
    name: `${prefix}commands_total`,
    help: 'Bot commands and callbacks handled by the gateway',
    labelNames: ['command', 'status'],
    registers: [registry],
  });

  const knowledgeRequests = new Counter({
    name: `${prefix}knowledge_requests_total`,
    help: 'Knowledge queries served, by operation and outcome',
    labelNames: ['operation', 'status'],
    registers: [registry],
  });

  const knowledgeCacheLookups = new Counter({
    name: `${prefix}knowledge_cache_lookups_total`,
    help: 'Knowledge cache lookups by result',
    labelNames: ['operation', 'result'],
    registers: [registry],
  });

  return {
    registry,
    requestCounter,
    requestDuration,
    agentRunFailures,
    updateFailures,
    outboundMessages,
    commandCounter,
    knowledgeRequests,
    knowledgeCacheLookups,
  };
}
