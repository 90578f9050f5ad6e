import { z } from 'zod';

import { BlockedInfo } from '../types';
import { FirewallClient, describeOutcome } from './client';

export const WILDCARD_VERSION = '*';

const blockedResponseSchema = z
  .object({
    blocked_versions: z.number().int().nonnegative().default(0),
    blocked_versions_list: z.array(z.string()).default([]),
    reasons: z.array(z.string()).default([]),
  })
  .passthrough();

function emptyInfo(pkg: string, status: BlockedInfo['status'], error?: string): BlockedInfo {
  const info: BlockedInfo = {
    package: pkg,
    status,
    blockedVersionCount: 0,
    blockedVersionsList: [],
    reasons: [],
  };
  if (error) info.error = error;
  return info;
}

/**
 * Parses the body of a 200 from `/blocked/{package}`. Exported for tests and
 * for the JSON reporter; never throws.
 */
export function parseBlockedResponse(pkg: string, body: string): BlockedInfo {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    return emptyInfo(pkg, 'error', `Malformed response from firewall: ${msg}`);
  }

  const parsed = blockedResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` (${issue.path.join('.')})` : '';
    return emptyInfo(pkg, 'error', `Malformed response from firewall${where}`);
  }

  const data = parsed.data;
  const list = data.blocked_versions_list;
  const count = Math.max(data.blocked_versions, list.length);
  if (count === 0 && !list.includes(WILDCARD_VERSION)) {
    return {
      ...emptyInfo(pkg, 'unknown', 'Blocked record lists no versions'),
      reasons: data.reasons,
      rawResponse: raw,
    };
  }

  return {
    package: pkg,
    status: 'blocked',
    blockedVersionCount: count,
    blockedVersionsList: list,
    reasons: data.reasons,
    rawResponse: raw,
  };
}

export class BlockedInfoResolver {
  constructor(private readonly client: FirewallClient) {}

  async getBlockedInfo(name: string): Promise<BlockedInfo> {
    const pkg = name.toLowerCase();
    const outcome = await this.client.get(`/blocked/${encodeURIComponent(pkg)}`);

    switch (outcome.kind) {
      case 'response':
        if (outcome.status === 404) return emptyInfo(pkg, 'allowed');
        if (outcome.status === 200) return parseBlockedResponse(pkg, outcome.body);
        return emptyInfo(pkg, 'unknown', `Unexpected status code: ${outcome.status}`);
      case 'connection-error':
        return emptyInfo(pkg, 'error', `Cannot connect to firewall at ${this.client.baseUrl}`);
      case 'timeout':
      case 'failure':
        return emptyInfo(pkg, 'error', `Firewall request ${describeOutcome(outcome)}`);
    }
  }
}
