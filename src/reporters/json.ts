import { BlockedInfo } from '../types';

export function report(info: BlockedInfo, auditUrl: string) {
  return JSON.stringify({ ...info, auditUrl }, null, 2);
}
