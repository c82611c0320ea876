import * as dotenv from 'dotenv';
import { z } from 'zod';
import { SolverMode } from './core/entities/Marketplace.js';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  solver: {
    mode: SolverMode;
    pollIntervalSeconds: number;
    runOnce: boolean;
    debug: boolean;
  };
  market: {
    url: string;
    apiKey: string;
    awardedProposalCode: number | string;
    resolvedInstanceCode: number | string;
    maxCreditPerInstance: number;
    counterpartyRole: string;
    maxConversationMessages: number;
    proposalWindowHours: number;
    requestTimeoutMs: number;
  };
  completion: {
    apiUrl: string;
    apiKey: string;
    rewardModel: string;
    cleanupModel: string;
    temperature: number;
    timeoutMs: number;
  };
  cache: {
    dbPath: string;
    ttlSeconds: number;
  };
  agent: {
    command: string;
    args: string[];
    model: string;
    timeoutMs: number;
    workdir?: string;
  };
}

const statusCodeSchema = z.union([z.number().int(), z.string().min(1)]);

// Zod validation schema
const ConfigSchema = z.object({
  solver: z.object({
    mode: z.enum(['reward', 'review']),
    pollIntervalSeconds: z.number().int().min(5).max(86400),
    runOnce: z.boolean(),
    debug: z.boolean(),
  }),
  market: z.object({
    url: z.string().url('Invalid marketplace URL format'),
    apiKey: z.string().min(1, 'Marketplace API key must not be empty'),
    awardedProposalCode: statusCodeSchema,
    resolvedInstanceCode: statusCodeSchema,
    maxCreditPerInstance: z.number().positive(),
    counterpartyRole: z.string().min(1),
    maxConversationMessages: z.number().int().min(1),
    proposalWindowHours: z.number().positive(),
    requestTimeoutMs: z.number().int().min(100).max(120000),
  }),
  completion: z.object({
    apiUrl: z.string().url('Invalid completion API URL format'),
    apiKey: z.string(),
    rewardModel: z.string().min(1),
    cleanupModel: z.string().min(1),
    temperature: z.number().min(0).max(2),
    timeoutMs: z.number().int().min(1000).max(600000),
  }),
  cache: z.object({
    dbPath: z.string().min(1),
    ttlSeconds: z.number().int().min(1),
  }),
  agent: z.object({
    command: z.string().min(1),
    args: z.array(z.string()),
    model: z.string().min(1),
    timeoutMs: z.number().int().min(1000),
    workdir: z.string().optional(),
  }),
});

export type CliArgs = Record<string, string | boolean>;

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --mode review --market-url https://market.example --once
 */
export function parseArgs(argv: string[] = process.argv): CliArgs {
  const args: CliArgs = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Numeric-looking status codes become numbers, anything else stays a string
 */
function toStatusCode(value: string): number | string {
  return /^-?\d+$/.test(value) ? parseInt(value, 10) : value;
}

/**
 * Build a configuration from CLI arguments and an environment map.
 * Throws a ZodError when the result does not validate.
 */
export function buildConfig(cliArgs: CliArgs, env: NodeJS.ProcessEnv): Config {
  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const cliValue = cliArgs[cliKey];
    if (cliValue !== undefined) return cliValue === true || cliValue === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const getStringArray = (cliKey: string, envKey: string, defaultValue: string[]): string[] => {
    const cliValue = cliArgs[cliKey];
    const value = typeof cliValue === 'string' ? cliValue : env[envKey];
    if (!value) return defaultValue;
    return value
      .split(' ')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  };

  const rawMode = getString('mode', 'SOLVER_MODE', 'reward');
  const workdir = getString('agent-workdir', 'AGENT_WORKDIR', '');

  const rawConfig = {
    solver: {
      mode: rawMode,
      pollIntervalSeconds: getNumber('poll-interval', 'POLL_INTERVAL_SECONDS', 60),
      runOnce: getBoolean('once', 'RUN_ONCE', false),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    market: {
      url: getString('market-url', 'MARKET_URL', 'https://api.agent.market').replace(/\/+$/, ''),
      apiKey: getString('market-api-key', 'MARKET_API_KEY', ''),
      awardedProposalCode: toStatusCode(
        getString('awarded-proposal-code', 'MARKET_AWARDED_PROPOSAL_CODE', '1')
      ),
      resolvedInstanceCode: toStatusCode(
        getString('resolved-instance-code', 'MARKET_RESOLVED_INSTANCE_CODE', '3')
      ),
      maxCreditPerInstance: getNumber('max-credit', 'MAX_CREDIT_PER_INSTANCE', 1.0),
      counterpartyRole: getString('counterparty-role', 'MARKET_COUNTERPARTY_ROLE', 'provider'),
      maxConversationMessages: getNumber('max-messages', 'MAX_CONVERSATION_MESSAGES', 15),
      proposalWindowHours: getNumber('proposal-window-hours', 'PROPOSAL_WINDOW_HOURS', 24),
      requestTimeoutMs: getNumber('request-timeout', 'MARKET_REQUEST_TIMEOUT_MS', 10000),
    },
    completion: {
      apiUrl: getString('completion-url', 'OPENAI_BASE_URL', 'https://api.openai.com/v1').replace(
        /\/+$/,
        ''
      ),
      apiKey: getString('openai-api-key', 'OPENAI_API_KEY', ''),
      rewardModel: getString('reward-model', 'REWARD_MODEL', 'gpt-4o'),
      cleanupModel: getString('cleanup-model', 'CLEANUP_MODEL', 'gpt-4o-mini'),
      temperature: getNumber('temperature', 'REWARD_TEMPERATURE', 0.3),
      timeoutMs: getNumber('completion-timeout', 'COMPLETION_TIMEOUT_MS', 60000),
    },
    cache: {
      dbPath: getString('cache-db', 'PROMPT_CACHE_DB', 'prompt_cache.db'),
      ttlSeconds: getNumber('cache-ttl', 'PROMPT_CACHE_TTL_SECONDS', 86400),
    },
    agent: {
      command: getString('agent-command', 'AGENT_COMMAND', 'aider'),
      args: getStringArray('agent-args', 'AGENT_ARGS', ['--yes-always', '--no-auto-commits']),
      model: getString('agent-model', 'AGENT_MODEL', 'gpt-4o'),
      timeoutMs: getNumber('agent-timeout', 'AGENT_TIMEOUT_MS', 600000),
      workdir: workdir || undefined,
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration from environment variables or CLI arguments
 * Validates configuration against schema and exits if invalid
 */
export function getConfig(): Config {
  try {
    return buildConfig(parseArgs(), process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach((err) => {
        const path = err.path.join('.');
        console.error(`  • ${path || 'root'}: ${err.message}`);
      });
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - MARKET_API_KEY is required');
      console.error('  - SOLVER_MODE must be "reward" or "review"');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

function mask(secret: string): string {
  if (!secret) return '(not set)';
  if (secret.length <= 8) return '****';
  return `${secret.slice(0, 4)}…${secret.slice(-2)}`;
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error('─'.repeat(68));
  console.error('  Market Instance Solver - Configuration');
  console.error('─'.repeat(68));

  console.error(
    `\n⚙️  Mode: ${config.solver.mode} | every ${config.solver.pollIntervalSeconds}s${config.solver.runOnce ? ' (single cycle)' : ''} ${config.solver.debug ? '(Debug Mode)' : ''}`
  );
  console.error(`🔗 Marketplace: ${config.market.url} (key ${mask(config.market.apiKey)})`);
  console.error(
    `   Awarded code: ${config.market.awardedProposalCode} | Resolved code: ${config.market.resolvedInstanceCode} | Window: ${config.market.proposalWindowHours}h`
  );
  console.error(`🤖 Completion: ${config.completion.apiUrl} (key ${mask(config.completion.apiKey)})`);

  if (config.solver.mode === 'reward') {
    console.error(
      `   Reward model: ${config.completion.rewardModel} @ ${config.completion.temperature} | Max credit: ${config.market.maxCreditPerInstance}`
    );
  } else {
    console.error(`   Cleanup model: ${config.completion.cleanupModel}`);
    console.error(`🛠️  Agent: ${config.agent.command} (${config.agent.model})`);
  }

  console.error(`💾 Cache: ${config.cache.dbPath} (TTL ${config.cache.ttlSeconds}s)`);
  console.error('\n' + '─'.repeat(68));
}
