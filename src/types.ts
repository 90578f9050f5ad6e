export interface PackageReference {
  name: string;
  version?: string;
  specifier: string; // original text, handed to pip unchanged
}

export type ValidationStatus = 'allow' | 'block';

export type FailureKind =
  | 'not_found'
  | 'blocked'
  | 'connection_error'
  | 'timeout'
  | 'unexpected_status'
  | 'malformed_response'
  | 'unverified'
  | 'internal';

export type BlockedStatus = 'blocked' | 'allowed' | 'unknown' | 'error';

export interface BlockedInfo {
  package: string;
  status: BlockedStatus;
  blockedVersionCount: number;
  blockedVersionsList: string[];
  reasons: string[];
  rawResponse?: unknown;
  error?: string;
}

export interface ValidationDetails {
  package: string;
  auditUrl: string;
  error?: FailureKind;
  statusCode?: number;
  blockedInfo?: BlockedInfo;
}

export interface ValidationResult {
  status: ValidationStatus;
  reason: string;
  details: ValidationDetails;
}

export interface BlockedPackageRecord {
  name: string;
  version: string;
}

export interface BlockedPackageReport {
  packages: BlockedPackageRecord[];
  count: number;
}

export interface InstallOptions {
  upgrade?: boolean;
  requirement?: string;
  indexUrl?: string;
  extraIndexUrl?: string;
  trustedHost?: string;
  noDeps?: boolean;
}

export interface PackageManagerHandler {
  buildInstallArgs(packages: PackageReference[], options: InstallOptions): string[];
}
