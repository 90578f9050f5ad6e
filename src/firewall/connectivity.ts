import { FirewallClient } from './client';

export const CONNECTIVITY_TIMEOUT_MS = 5_000;

export class ConnectivityProbe {
  constructor(
    private readonly client: FirewallClient,
    private readonly timeoutMs: number = CONNECTIVITY_TIMEOUT_MS,
  ) {}

  /** 200 and 404 both mean the firewall is up and routing requests. */
  async checkConnectivity(): Promise<boolean> {
    const outcome = await this.client.get('/simple/', this.timeoutMs);
    return outcome.kind === 'response' && (outcome.status === 200 || outcome.status === 404);
  }
}
