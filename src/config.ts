/**
 * Engine configuration.
 *
 * Usage:
 *   const config = loadEngineConfig(process.env);
 *   const result = validateEngineConfig(config);
 *   if (!result.valid) logger.error('Invalid configuration', { errors: result.errors });
 *
 * Values are read once at startup by the composition root and injected into
 * the components that need them.
 */

import { LogLevel, parseLogLevel } from './logger';

/** Approval channel delivery settings. */
export interface ApprovalChannelConfig {
  /** Base URL of the messaging service (e.g., "https://chat.example.com/api/"). */
  serviceUrl?: string;
  /** Conversation that receives mitigation approval cards. */
  channelId?: string;
  /** Sender identity attached to outbound activities. */
  botId?: string;
  /** Bearer token used to authenticate outbound activities. */
  botToken?: string;
  /** When set, outbound bodies carry an HMAC-SHA256 signature header. */
  signingSecret?: string;
}

/** Inbound callback verification settings. */
export interface CallbackConfig {
  /** Shared secret expected in the callback header. Unset disables the check. */
  sharedSecret?: string;
  /** Header carrying the shared secret. Lowercased on load. */
  secretHeader: string;
}

export interface EngineConfig {
  /** Composite scores at or above this trigger an automated block. */
  autoMitigationThreshold: number;
  /** Security-analytics workspace queried for correlated detections. */
  analyticsWorkspaceId?: string;
  /** Look-back window for security-analytics queries. */
  analyticsWindowHours: number;
  /** Conditional-access policy template applied when blocking. */
  conditionalAccessPolicyTemplateId?: string;
  approvalChannel: ApprovalChannelConfig;
  callback: CallbackConfig;
  /** Prefix applied to every reconciled group display name. */
  groupPrefix: string;
  /** Role or resource id → group display name (unprefixed). */
  roleToGroup: Record<string, string>;
  /** Per-call timeout for signal-source queries. */
  signalTimeoutMs: number;
  /** Concurrency bound for batch assessments. */
  batchConcurrency: number;
  logLevel: LogLevel;
  port: number;
}

/** Validation result for an engine configuration. */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export const DEFAULT_AUTO_MITIGATION_THRESHOLD = 90;
export const DEFAULT_CALLBACK_SECRET_HEADER = 'x-approval-secret';

/** Create an engine config with defaults. */
export function createEngineConfig(overrides?: Partial<EngineConfig>): EngineConfig {
  return {
    autoMitigationThreshold: DEFAULT_AUTO_MITIGATION_THRESHOLD,
    analyticsWindowHours: 24,
    groupPrefix: '',
    roleToGroup: {},
    signalTimeoutMs: 5_000,
    batchConcurrency: 4,
    logLevel: LogLevel.Info,
    port: 5000,
    ...overrides,
    approvalChannel: { ...overrides?.approvalChannel },
    callback: {
      secretHeader: DEFAULT_CALLBACK_SECRET_HEADER,
      ...overrides?.callback,
    },
  };
}

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : NaN;
}

/**
 * Parse a role map of the form "finance_analyst=Finance-Analysts,dev=Developers".
 * Entries without "=" or with an empty side are ignored.
 */
export function parseRoleGroupMap(raw: string | undefined): Record<string, string> {
  const map: Record<string, string> = {};
  if (!raw) return map;
  for (const entry of raw.split(',')) {
    const [role, group] = entry.split('=').map((part) => part.trim());
    if (role && group) map[role] = group;
  }
  return map;
}

/** Build an engine config from environment variables. */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return createEngineConfig({
    autoMitigationThreshold: readNumber(env, 'AUTO_MITIGATION_THRESHOLD', DEFAULT_AUTO_MITIGATION_THRESHOLD),
    analyticsWorkspaceId: readString(env, 'ANALYTICS_WORKSPACE_ID'),
    analyticsWindowHours: readNumber(env, 'ANALYTICS_WINDOW_HOURS', 24),
    conditionalAccessPolicyTemplateId: readString(env, 'CA_POLICY_TEMPLATE_ID'),
    approvalChannel: {
      serviceUrl: readString(env, 'APPROVAL_SERVICE_URL'),
      channelId: readString(env, 'APPROVAL_CHANNEL_ID'),
      botId: readString(env, 'APPROVAL_BOT_ID'),
      botToken: readString(env, 'APPROVAL_BOT_TOKEN'),
      signingSecret: readString(env, 'APPROVAL_SIGNING_SECRET'),
    },
    callback: {
      sharedSecret: readString(env, 'CALLBACK_SHARED_SECRET'),
      secretHeader: (readString(env, 'CALLBACK_SECRET_HEADER') ?? DEFAULT_CALLBACK_SECRET_HEADER).toLowerCase(),
    },
    groupPrefix: env.GROUP_PREFIX ?? '',
    roleToGroup: parseRoleGroupMap(readString(env, 'ROLE_GROUP_MAP')),
    signalTimeoutMs: readNumber(env, 'SIGNAL_TIMEOUT_MS', 5_000),
    batchConcurrency: readNumber(env, 'BATCH_CONCURRENCY', 4),
    logLevel: parseLogLevel(readString(env, 'LOG_LEVEL')),
    port: readNumber(env, 'PORT', 5000),
  });
}

/** Validate an engine configuration for consistency. */
export function validateEngineConfig(config: EngineConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.autoMitigationThreshold) || config.autoMitigationThreshold < 0 || config.autoMitigationThreshold > 100) {
    errors.push('autoMitigationThreshold must be an integer between 0 and 100');
  } else if (config.autoMitigationThreshold === 0) {
    warnings.push('autoMitigationThreshold is 0; every evaluation will block the principal');
  }

  if (!(config.analyticsWindowHours > 0)) {
    errors.push('analyticsWindowHours must be positive');
  }

  if (!Number.isInteger(config.signalTimeoutMs) || config.signalTimeoutMs < 1) {
    errors.push('signalTimeoutMs must be a positive integer');
  }

  if (!Number.isInteger(config.batchConcurrency) || config.batchConcurrency < 1) {
    errors.push('batchConcurrency must be at least 1');
  }

  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    errors.push('port must be between 1 and 65535');
  }

  if (!config.callback.secretHeader) {
    errors.push('callback.secretHeader must not be empty');
  }

  if (!config.callback.sharedSecret) {
    warnings.push('No callback shared secret configured; approval callbacks are accepted unauthenticated');
  }

  const channel = config.approvalChannel;
  if (channel.serviceUrl && !channel.channelId) {
    errors.push('approvalChannel.channelId is required when approvalChannel.serviceUrl is set');
  }
  if (!channel.serviceUrl) {
    warnings.push('No approval channel configured; approval cards will not be delivered');
  }

  if (!config.analyticsWorkspaceId) {
    warnings.push('No analytics workspace configured; security-analytics signals will be reported unavailable');
  }

  return { valid: errors.length === 0, errors, warnings };
}
