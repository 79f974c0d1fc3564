export type ErrorCode =
  | 'UNREADABLE_CONFIG'
  | 'MALFORMED_SERVER_CONFIG'
  | 'PROJECT_NOT_FOUND'
  | 'SCAN_ABORTED'
  | 'DIRECTORY_UNREADABLE'
  | 'SCAN_CANCELLED';

export class McpScanError extends Error {
  constructor(readonly code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A config file exists but cannot be read or parsed as JSON. */
export class UnreadableConfig extends McpScanError {
  constructor(readonly file: string, options?: { cause?: unknown }) {
    super('UNREADABLE_CONFIG', `Unreadable config: ${file}${describeCause(options?.cause)}`, options);
  }
}

/** One server entry is missing or has invalid required fields; its siblings are unaffected. */
export class MalformedServerConfig extends McpScanError {
  constructor(readonly server: string, readonly file: string, readonly reason: string) {
    super('MALFORMED_SERVER_CONFIG', `Malformed server "${server}" in ${file}: ${reason}`);
  }
}

export class ProjectNotFound extends McpScanError {
  constructor(readonly path: string) {
    super('PROJECT_NOT_FOUND', `Project not found: ${path}`);
  }
}

/** A scan root could not be read. The remaining roots are still scanned. */
export class ScanAborted extends McpScanError {
  constructor(readonly root: string, options?: { cause?: unknown }) {
    super('SCAN_ABORTED', `Cannot scan root ${root}${describeCause(options?.cause)}`, options);
  }
}

export class DirectoryUnreadable extends McpScanError {
  constructor(readonly path: string, options?: { cause?: unknown }) {
    super('DIRECTORY_UNREADABLE', `Cannot read directory ${path}${describeCause(options?.cause)}`, options);
  }
}

export class ScanCancelled extends McpScanError {
  constructor() {
    super('SCAN_CANCELLED', 'Scan cancelled');
  }
}

export class ScanError extends AggregateError {
  constructor(errors: Error[]) {
    super(errors, `Scan finished with ${errors.length} error${errors.length === 1 ? '' : 's'}`);
    this.name = 'ScanError';
  }
}

function describeCause(cause: unknown): string {
  if (cause === undefined) return '';
  return `: ${cause instanceof Error ? cause.message : String(cause)}`;
}

export function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}
