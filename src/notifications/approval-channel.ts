/**
 * Approval Channel.
 *
 * Delivers mitigation approval cards and plain notices to the human review
 * channel. The HTTP strategy posts adaptive-card activities to
 * `<serviceUrl>/v3/conversations/<channelId>/activities` and signs the body
 * with HMAC-SHA256 when a signing secret is configured.
 *
 * Card buttons echo `{ action, user_id, token }` back to the approval
 * callback endpoint.
 */

import { createHmac } from 'crypto';
import { ApprovalChannelConfig } from '../config';
import { ApprovalDecisionKind, CardActionData } from '../domain/approval';
import { errorMessage, maskSecretsInMessage } from '../domain/errors';
import { MitigationKind } from '../domain/mitigation';
import { RiskLevel } from '../domain/risk';
import { createLogger } from '../logger';

/** Content of a mitigation approval card. */
export interface MitigationApprovalCard {
  token: string;
  principalId: string;
  displayName?: string;
  kind: MitigationKind;
  reason: string;
  compositeScore: number;
  riskLevel: RiskLevel;
}

/** A plain informational message (e.g., "Access restored after investigation."). */
export interface ChannelNotice {
  principalId?: string;
  title: string;
  text: string;
}

/** Channel delivery result. */
export interface ChannelDeliveryResult {
  success: boolean;
  statusCode?: number;
  error?: string;
}

export interface ApprovalChannel {
  sendMitigationApproval(card: MitigationApprovalCard): Promise<ChannelDeliveryResult>;
  sendNotice(notice: ChannelNotice): Promise<ChannelDeliveryResult>;
}

export interface AdaptiveCardAction {
  type: 'Action.Submit';
  title: string;
  data: CardActionData;
}

export interface AdaptiveCardTextBlock {
  type: 'TextBlock';
  text: string;
  weight?: 'Bolder';
  size?: 'Small' | 'Large';
  color?: 'Attention' | 'Good';
  wrap?: boolean;
}

/** Outbound message activity carrying one adaptive card. */
export interface ChannelActivity {
  type: 'message';
  from?: { id: string };
  conversation: { id: string };
  attachments: Array<{
    contentType: 'application/vnd.microsoft.card.adaptive';
    content: {
      type: 'AdaptiveCard';
      version: '1.5';
      body: AdaptiveCardTextBlock[];
      actions?: AdaptiveCardAction[];
    };
  }>;
}

/** Channel delivery function type (injectable for testing). */
export type ChannelDeliveryFn = (
  url: string,
  activity: ChannelActivity,
  options: { botToken?: string; signingSecret?: string },
) => Promise<{ statusCode: number }>;

const log = createLogger({ component: 'approval-channel' });

function wrapCard(
  channelId: string,
  botId: string | undefined,
  body: AdaptiveCardTextBlock[],
  actions?: AdaptiveCardAction[],
): ChannelActivity {
  return {
    type: 'message',
    from: botId ? { id: botId } : undefined,
    conversation: { id: channelId },
    attachments: [
      {
        contentType: 'application/vnd.microsoft.card.adaptive',
        content: { type: 'AdaptiveCard', version: '1.5', body, actions },
      },
    ],
  };
}

/** Build the "re-enable / keep blocked" card for a pending mitigation. */
export function buildMitigationApprovalActivity(
  card: MitigationApprovalCard,
  channelId: string,
  botId?: string,
): ChannelActivity {
  const principal = card.displayName ? `${card.displayName} (${card.principalId})` : card.principalId;
  const mechanism = card.kind === MitigationKind.ConditionalAccessBlock ? 'Conditional access block' : 'Account disabled';
  return wrapCard(
    channelId,
    botId,
    [
      { type: 'TextBlock', text: 'HIGH RISK PRINCIPAL BLOCKED', weight: 'Bolder', color: 'Attention' },
      { type: 'TextBlock', text: `Principal: ${principal}` },
      { type: 'TextBlock', text: `Risk Score: ${card.compositeScore}/100 (${card.riskLevel})` },
      { type: 'TextBlock', text: `Mechanism: ${mechanism}` },
      { type: 'TextBlock', text: `Reason: ${card.reason}`, wrap: true },
      { type: 'TextBlock', text: `Reference: ${card.token}`, size: 'Small' },
    ],
    [
      {
        type: 'Action.Submit',
        title: 'Re-enable',
        data: { action: ApprovalDecisionKind.ReEnable, user_id: card.principalId, token: card.token },
      },
      {
        type: 'Action.Submit',
        title: 'Keep Blocked',
        data: { action: ApprovalDecisionKind.KeepBlocked, user_id: card.principalId, token: card.token },
      },
    ],
  );
}

export function buildNoticeActivity(notice: ChannelNotice, channelId: string, botId?: string): ChannelActivity {
  const body: AdaptiveCardTextBlock[] = [{ type: 'TextBlock', text: notice.title, weight: 'Bolder' }];
  if (notice.principalId) body.push({ type: 'TextBlock', text: `Principal: ${notice.principalId}` });
  body.push({ type: 'TextBlock', text: notice.text, wrap: true });
  return wrapCard(channelId, botId, body);
}

type BlockedRange = 'localhost' | 'cloud metadata endpoints' | 'private IP range' | 'link-local range' | 'unspecified address';

const METADATA_HOSTS = new Set(['169.254.169.254', 'metadata.google.internal', '[fd00:ec2::254]']);

function classifyIPv4([a, b]: number[]): BlockedRange | null {
  if (a === 127) return 'localhost';
  if (a === 0) return 'unspecified address';
  if (a === 10 || (a === 172 && b >= 16 && b <= 31) || (a === 192 && b === 168)) return 'private IP range';
  // Carrier-grade NAT, 100.64.0.0/10
  if (a === 100 && b >= 64 && b <= 127) return 'private IP range';
  if (a === 169 && b === 254) return 'link-local range';
  return null;
}

/** Eight 16-bit groups, or null when the text is not a compressed-hex IPv6 address. */
function ipv6Groups(address: string): number[] | null {
  const halves = address.split('::');
  if (halves.length > 2) return null;
  const parse = (part: string) => (part === '' ? [] : part.split(':').map((g) => parseInt(g, 16)));
  const head = parse(halves[0]);
  const tail = halves.length === 2 ? parse(halves[1]) : [];
  const gap = 8 - head.length - tail.length;
  if (gap < 0 || (halves.length === 1 && gap !== 0)) return null;
  const groups = [...head, ...new Array<number>(gap).fill(0), ...tail];
  return groups.every((g) => Number.isInteger(g) && g >= 0 && g <= 0xffff) ? groups : null;
}

// URL serializes every IPv6 host as bracketed compressed hex, IPv4-mapped
// addresses included (::ffff:7f00:1), so dotted tails never reach here.
function classifyIPv6(address: string): BlockedRange | null {
  const g = ipv6Groups(address);
  if (!g) return null;
  const leadingZeros = g.findIndex((x) => x !== 0);
  if (leadingZeros === -1) return 'unspecified address';
  if (leadingZeros === 7 && g[7] === 1) return 'localhost';
  if (leadingZeros === 5 && g[5] === 0xffff) {
    return classifyIPv4([g[6] >> 8, g[6] & 0xff, g[7] >> 8, g[7] & 0xff]);
  }
  // fc00::/7 unique local, fe80::/10 link-local
  if ((g[0] & 0xfe00) === 0xfc00) return 'private IP range';
  if ((g[0] & 0xffc0) === 0xfe80) return 'link-local range';
  return null;
}

/**
 * Validate that a channel URL is safe to send HTTP requests to.
 * Returns an error message if the URL is unsafe, or null if safe.
 *
 * Rejects non-HTTP(S) protocols, localhost and loopback, cloud metadata
 * endpoints, and private, link-local or unspecified addresses in both IPv4
 * and IPv6 (IPv4-mapped IPv6 is judged by its IPv4 part).
 */
export function validateChannelUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return `Invalid channel URL: ${url}`;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return `Channel URL must use http or https protocol, got: ${parsed.protocol}`;
  }

  const hostname = parsed.hostname.toLowerCase();
  let range: BlockedRange | null = null;
  if (hostname === 'localhost' || hostname.endsWith('.localhost')) {
    range = 'localhost';
  } else if (METADATA_HOSTS.has(hostname)) {
    range = 'cloud metadata endpoints';
  } else if (hostname.startsWith('[') && hostname.endsWith(']')) {
    range = classifyIPv6(hostname.slice(1, -1));
  } else if (/^\d{1,3}(\.\d{1,3}){3}$/.test(hostname)) {
    range = classifyIPv4(hostname.split('.').map(Number));
  }

  return range ? `Channel URL must not point to ${range}: ${hostname}` : null;
}

export function activitiesUrl(serviceUrl: string, channelId: string): string {
  const base = serviceUrl.endsWith('/') ? serviceUrl : `${serviceUrl}/`;
  return `${base}v3/conversations/${encodeURIComponent(channelId)}/activities`;
}

export function signBody(body: string, secret: string): string {
  return `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;
}

// Up to 3 retries with exponential backoff (1s, 2s, 4s) on network errors
// and 5xx responses. 4xx fails immediately.
const CHANNEL_MAX_RETRIES = 3;
const CHANNEL_BACKOFF_BASE_MS = 1000;
const CHANNEL_TIMEOUT_MS = 10_000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** HTTP delivery using native fetch with bearer auth, HMAC signing and retry. */
export const httpChannelDelivery: ChannelDeliveryFn = async (url, activity, options) => {
  const body = JSON.stringify(activity);
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'User-Agent': 'identity-risk-engine/0.1.0',
  };
  if (options.botToken) {
    headers['Authorization'] = `Bearer ${options.botToken}`;
  }
  if (options.signingSecret) {
    headers['X-Signature'] = signBody(body, options.signingSecret);
  }

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= CHANNEL_MAX_RETRIES; attempt++) {
    if (attempt > 0) {
      await sleep(CHANNEL_BACKOFF_BASE_MS * Math.pow(2, attempt - 1));
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), CHANNEL_TIMEOUT_MS);

    try {
      const response = await fetch(url, { method: 'POST', headers, body, signal: controller.signal });
      clearTimeout(timeout);

      if (response.status < 500) {
        return { statusCode: response.status };
      }
      lastError = new Error(`Channel returned HTTP ${response.status}`);
    } catch (err) {
      clearTimeout(timeout);
      lastError = err instanceof Error ? err : new Error('Unknown channel error');
    }
  }

  throw lastError ?? new Error('Channel delivery failed after retries');
};

/** Approval channel backed by an HTTP messaging service. */
export class HttpApprovalChannel implements ApprovalChannel {
  private deliveryFn: ChannelDeliveryFn;

  constructor(
    private config: ApprovalChannelConfig,
    deliveryFn?: ChannelDeliveryFn,
  ) {
    this.deliveryFn = deliveryFn ?? httpChannelDelivery;
  }

  async sendMitigationApproval(card: MitigationApprovalCard): Promise<ChannelDeliveryResult> {
    const channelId = this.config.channelId;
    if (!channelId) return { success: false, error: 'No approval channel id configured' };
    return this.deliver(buildMitigationApprovalActivity(card, channelId, this.config.botId));
  }

  async sendNotice(notice: ChannelNotice): Promise<ChannelDeliveryResult> {
    const channelId = this.config.channelId;
    if (!channelId) return { success: false, error: 'No approval channel id configured' };
    return this.deliver(buildNoticeActivity(notice, channelId, this.config.botId));
  }

  private async deliver(activity: ChannelActivity): Promise<ChannelDeliveryResult> {
    const { serviceUrl, botToken, signingSecret } = this.config;
    if (!serviceUrl) return { success: false, error: 'No approval channel service URL configured' };

    const urlError = validateChannelUrl(serviceUrl);
    if (urlError) return { success: false, error: urlError };

    const url = activitiesUrl(serviceUrl, activity.conversation.id);
    try {
      const response = await this.deliveryFn(url, activity, { botToken, signingSecret });
      const success = response.statusCode >= 200 && response.statusCode < 300;
      if (!success) {
        log.warn('Approval channel rejected activity', { statusCode: response.statusCode });
        return { success, statusCode: response.statusCode, error: `Channel returned HTTP ${response.statusCode}` };
      }
      return { success, statusCode: response.statusCode };
    } catch (err) {
      const error = maskSecretsInMessage(errorMessage(err, 'Channel delivery failed'), [
        botToken ?? '',
        signingSecret ?? '',
      ]);
      log.error('Approval channel delivery failed', { error });
      return { success: false, error };
    }
  }
}

/** One message captured by the recording channel. */
export type RecordedMessage =
  | { kind: 'approval'; card: MitigationApprovalCard }
  | { kind: 'notice'; notice: ChannelNotice };

/**
 * In-process channel that records every message instead of sending it.
 * Used when no messaging service is configured and in tests.
 */
export class RecordingApprovalChannel implements ApprovalChannel {
  readonly messages: RecordedMessage[] = [];
  /** When set, every send fails with this error (after being recorded). */
  failWith?: string;

  async sendMitigationApproval(card: MitigationApprovalCard): Promise<ChannelDeliveryResult> {
    this.messages.push({ kind: 'approval', card: { ...card } });
    return this.result();
  }

  async sendNotice(notice: ChannelNotice): Promise<ChannelDeliveryResult> {
    this.messages.push({ kind: 'notice', notice: { ...notice } });
    return this.result();
  }

  approvals(): MitigationApprovalCard[] {
    return this.messages.flatMap((m) => (m.kind === 'approval' ? [m.card] : []));
  }

  notices(): ChannelNotice[] {
    return this.messages.flatMap((m) => (m.kind === 'notice' ? [m.notice] : []));
  }

  private result(): ChannelDeliveryResult {
    return this.failWith ? { success: false, error: this.failWith } : { success: true };
  }
}
