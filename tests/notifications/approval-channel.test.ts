/**
 * Tests for the approval channel: card layout, URL safety, signing and
 * delivery outcomes.
 */

import { createHmac } from 'crypto';
import { ApprovalChannelConfig } from '../../src/config';
import { MitigationKind } from '../../src/domain/mitigation';
import { RiskLevel } from '../../src/domain/risk';
import {
  HttpApprovalChannel,
  RecordingApprovalChannel,
  activitiesUrl,
  buildMitigationApprovalActivity,
  buildNoticeActivity,
  signBody,
  validateChannelUrl,
} from '../../src/notifications/approval-channel';
import type { ChannelDeliveryFn, MitigationApprovalCard } from '../../src/notifications/approval-channel';

const card: MitigationApprovalCard = {
  token: 'mit_abc',
  principalId: 'u1',
  displayName: 'Test u1',
  kind: MitigationKind.ConditionalAccessBlock,
  reason: 'Auto-mitigation: risk 90',
  compositeScore: 90,
  riskLevel: RiskLevel.Critical,
};

const config: ApprovalChannelConfig = {
  serviceUrl: 'https://chat.example.com/api',
  channelId: 'security-ops',
  botId: 'risk-bot',
  botToken: 'test-token-value',
  signingSecret: 'test-secret',
};

describe('validateChannelUrl', () => {
  describe('blocks unsafe URLs', () => {
    it('rejects localhost', () => {
      expect(validateChannelUrl('http://localhost:3000/api')).toBe('Channel URL must not point to localhost: localhost');
      expect(validateChannelUrl('http://127.0.0.1:8080/api')).not.toBeNull();
    });

    it('rejects cloud metadata endpoints', () => {
      expect(validateChannelUrl('http://169.254.169.254/latest/meta-data')).toBe(
        'Channel URL must not point to cloud metadata endpoints: 169.254.169.254',
      );
      expect(validateChannelUrl('http://metadata.google.internal/computeMetadata')).not.toBeNull();
    });

    it('rejects private IP ranges', () => {
      expect(validateChannelUrl('http://10.0.0.1/api')).toBe('Channel URL must not point to private IP range: 10.0.0.1');
      expect(validateChannelUrl('http://172.16.0.1/api')).not.toBeNull();
      expect(validateChannelUrl('http://172.31.255.255/api')).not.toBeNull();
      expect(validateChannelUrl('http://192.168.1.1/api')).not.toBeNull();
    });

    it('rejects link-local and unspecified addresses', () => {
      expect(validateChannelUrl('http://169.254.1.1/api')).not.toBeNull();
      expect(validateChannelUrl('http://0.0.0.0/api')).not.toBeNull();
    });

    it('rejects the whole loopback block and numeric host spellings of it', () => {
      expect(validateChannelUrl('http://127.1.2.3/api')).toBe('Channel URL must not point to localhost: 127.1.2.3');
      expect(validateChannelUrl('http://2130706433/api')).toBe('Channel URL must not point to localhost: 127.0.0.1');
      expect(validateChannelUrl('http://api.localhost/api')).toBe('Channel URL must not point to localhost: api.localhost');
    });

    it('rejects the carrier-grade NAT range', () => {
      expect(validateChannelUrl('http://100.64.0.1/api')).toBe('Channel URL must not point to private IP range: 100.64.0.1');
      expect(validateChannelUrl('http://100.128.0.1/api')).toBeNull();
    });

    it('rejects IPv6 loopback, unspecified, unique-local and link-local hosts', () => {
      expect(validateChannelUrl('http://[::1]:3978/api')).toBe('Channel URL must not point to localhost: [::1]');
      expect(validateChannelUrl('http://[::]/api')).toBe('Channel URL must not point to unspecified address: [::]');
      expect(validateChannelUrl('http://[FD12:3456::1]/api')).toBe(
        'Channel URL must not point to private IP range: [fd12:3456::1]',
      );
      expect(validateChannelUrl('http://[fe80::1]/api')).toBe('Channel URL must not point to link-local range: [fe80::1]');
      expect(validateChannelUrl('http://[fd00:ec2::254]/latest')).toBe(
        'Channel URL must not point to cloud metadata endpoints: [fd00:ec2::254]',
      );
    });

    it('judges IPv4-mapped IPv6 by its IPv4 part', () => {
      expect(validateChannelUrl('http://[::ffff:127.0.0.1]/api')).toBe('Channel URL must not point to localhost: [::ffff:7f00:1]');
      expect(validateChannelUrl('http://[::ffff:10.0.0.1]/api')).toBe(
        'Channel URL must not point to private IP range: [::ffff:a00:1]',
      );
      expect(validateChannelUrl('http://[::ffff:8.8.8.8]/api')).toBeNull();
    });

    it('rejects non-HTTP protocols', () => {
      expect(validateChannelUrl('ftp://example.com/api')).toBe('Channel URL must use http or https protocol, got: ftp:');
      expect(validateChannelUrl('file:///etc/passwd')).not.toBeNull();
    });

    it('rejects invalid URLs', () => {
      expect(validateChannelUrl('not-a-url')).toBe('Invalid channel URL: not-a-url');
      expect(validateChannelUrl('')).not.toBeNull();
    });
  });

  describe('allows safe URLs', () => {
    it('allows public HTTPS URLs', () => {
      expect(validateChannelUrl('https://chat.example.com/api')).toBeNull();
    });

    it('allows public IPv6 hosts', () => {
      expect(validateChannelUrl('https://[2606:4700::1111]/api')).toBeNull();
    });

    it('allows 172.32+ (outside private range)', () => {
      expect(validateChannelUrl('http://172.32.0.1/api')).toBeNull();
    });
  });
});

describe('Activity building', () => {
  it('builds the approval card with correlated buttons', () => {
    const activity = buildMitigationApprovalActivity(card, 'security-ops', 'risk-bot');

    expect(activity.from).toEqual({ id: 'risk-bot' });
    expect(activity.conversation).toEqual({ id: 'security-ops' });
    const content = activity.attachments[0].content;
    expect(content.body.map((b) => b.text)).toEqual([
      'HIGH RISK PRINCIPAL BLOCKED',
      'Principal: Test u1 (u1)',
      'Risk Score: 90/100 (critical)',
      'Mechanism: Conditional access block',
      'Reason: Auto-mitigation: risk 90',
      'Reference: mit_abc',
    ]);
    expect(content.actions).toEqual([
      { type: 'Action.Submit', title: 'Re-enable', data: { action: 're_enable', user_id: 'u1', token: 'mit_abc' } },
      {
        type: 'Action.Submit',
        title: 'Keep Blocked',
        data: { action: 'keep_blocked', user_id: 'u1', token: 'mit_abc' },
      },
    ]);
  });

  it('names the disable mechanism', () => {
    const activity = buildMitigationApprovalActivity({ ...card, kind: MitigationKind.Disable }, 'security-ops');

    expect(activity.attachments[0].content.body[3].text).toBe('Mechanism: Account disabled');
    expect(activity.from).toBeUndefined();
  });

  it('builds a notice without buttons', () => {
    const activity = buildNoticeActivity(
      { principalId: 'u1', title: 'ACCESS RESTORED', text: 'Access restored after investigation.' },
      'security-ops',
    );

    const content = activity.attachments[0].content;
    expect(content.body.map((b) => b.text)).toEqual([
      'ACCESS RESTORED',
      'Principal: u1',
      'Access restored after investigation.',
    ]);
    expect(content.actions).toBeUndefined();
  });
});

describe('activitiesUrl and signBody', () => {
  it('joins the service URL and an encoded channel id', () => {
    expect(activitiesUrl('https://chat.example.com/api', 'security ops')).toBe(
      'https://chat.example.com/api/v3/conversations/security%20ops/activities',
    );
    expect(activitiesUrl('https://chat.example.com/api/', 'c1')).toBe(
      'https://chat.example.com/api/v3/conversations/c1/activities',
    );
  });

  it('signs with HMAC-SHA256', () => {
    const expected = createHmac('sha256', 'test-secret').update('{"a":1}').digest('hex');
    expect(signBody('{"a":1}', 'test-secret')).toBe(`sha256=${expected}`);
  });
});

describe('HttpApprovalChannel', () => {
  it('delivers the approval card to the activities endpoint', async () => {
    const deliveryFn = jest.fn<ReturnType<ChannelDeliveryFn>, Parameters<ChannelDeliveryFn>>()
      .mockResolvedValue({ statusCode: 201 });
    const channel = new HttpApprovalChannel(config, deliveryFn);

    const result = await channel.sendMitigationApproval(card);

    expect(result).toEqual({ success: true, statusCode: 201 });
    expect(deliveryFn).toHaveBeenCalledTimes(1);
    const [url, activity, options] = deliveryFn.mock.calls[0];
    expect(url).toBe('https://chat.example.com/api/v3/conversations/security-ops/activities');
    expect(activity.attachments[0].content.body[0].text).toBe('HIGH RISK PRINCIPAL BLOCKED');
    expect(options).toEqual({ botToken: 'test-token-value', signingSecret: 'test-secret' });
  });

  it('blocks delivery to a private service URL', async () => {
    const deliveryFn = jest.fn<ReturnType<ChannelDeliveryFn>, Parameters<ChannelDeliveryFn>>()
      .mockResolvedValue({ statusCode: 200 });
    const channel = new HttpApprovalChannel({ ...config, serviceUrl: 'http://10.0.0.1/internal' }, deliveryFn);

    const result = await channel.sendNotice({ title: 'ACCESS RESTORED', text: 'restored' });

    expect(result.success).toBe(false);
    expect(result.error).toContain('private IP');
    expect(deliveryFn).not.toHaveBeenCalled();
  });

  it('fails without a channel id or service URL', async () => {
    const deliveryFn = jest.fn<ReturnType<ChannelDeliveryFn>, Parameters<ChannelDeliveryFn>>();

    expect(await new HttpApprovalChannel({ ...config, channelId: undefined }, deliveryFn).sendMitigationApproval(card))
      .toEqual({ success: false, error: 'No approval channel id configured' });
    expect(await new HttpApprovalChannel({ ...config, serviceUrl: undefined }, deliveryFn).sendMitigationApproval(card))
      .toEqual({ success: false, error: 'No approval channel service URL configured' });
    expect(deliveryFn).not.toHaveBeenCalled();
  });

  it('reports a non-2xx response', async () => {
    const channel = new HttpApprovalChannel(config, async () => ({ statusCode: 403 }));

    expect(await channel.sendMitigationApproval(card)).toEqual({
      success: false,
      statusCode: 403,
      error: 'Channel returned HTTP 403',
    });
  });

  it('masks credentials in delivery errors', async () => {
    const channel = new HttpApprovalChannel(config, async () => {
      throw new Error('auth failed for test-token-value');
    });

    const result = await channel.sendMitigationApproval(card);

    expect(result).toEqual({ success: false, error: 'auth failed for ************alue' });
  });
});

describe('RecordingApprovalChannel', () => {
  it('records approvals and notices separately', async () => {
    const channel = new RecordingApprovalChannel();

    await channel.sendMitigationApproval(card);
    await channel.sendNotice({ title: 'ACCESS RESTORED', text: 'restored' });

    expect(channel.approvals()).toEqual([card]);
    expect(channel.notices()).toEqual([{ title: 'ACCESS RESTORED', text: 'restored' }]);
    expect(channel.messages.map((m) => m.kind)).toEqual(['approval', 'notice']);
  });

  it('records and then fails when configured to fail', async () => {
    const channel = new RecordingApprovalChannel();
    channel.failWith = 'channel down';

    expect(await channel.sendMitigationApproval(card)).toEqual({ success: false, error: 'channel down' });
    expect(channel.approvals()).toHaveLength(1);
  });
});
