/**
 * Error kinds raised while bringing up, probing or tearing down a replica set.
 *
 * Retry and swallow decisions are made on `kind`, never on a server error
 * code or a message substring.
 */
export type ReplSetErrorKind =
  | 'ConfigurationPrecondition'
  | 'QuorumTransient'
  | 'ConfigurationError'
  | 'ConnectivityTransient'
  | 'LeaderDiscoveryTimeout'
  | 'WaitTimeout'
  | 'ProcessError';

export abstract class ReplSetError extends Error {
  abstract readonly kind: ReplSetErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * An accessor that needs the set's identity was called before `setup()`
 */
export class PreconditionError extends ReplSetError {
  readonly kind = 'ConfigurationPrecondition' as const;
}

/**
 * `replSetInitiate` / `replSetReconfig` failed because a heartbeat timed out
 * during the quorum check (server code NodeNotFound)
 */
export class NodeNotFoundError extends ReplSetError {
  readonly kind = 'QuorumTransient' as const;
  readonly code = 74;
}

export class CommandFailedError extends ReplSetError {
  readonly kind = 'ConfigurationError' as const;

  constructor(message: string, readonly code?: number, readonly command?: string) {
    super(message);
  }
}

/**
 * The connection to a member dropped, e.g. because a primary stepped down
 * between two probes
 */
export class ConnectivityLostError extends ReplSetError {
  readonly kind = 'ConnectivityTransient' as const;
}

export class LeaderDiscoveryTimeoutError extends ReplSetError {
  readonly kind = 'LeaderDiscoveryTimeout' as const;

  constructor(readonly replSetName: string, readonly elapsedMs: number) {
    super(`Timed out while waiting for a primary for replica set '${replSetName}'.`);
  }
}

export class WaitTimeoutError extends ReplSetError {
  readonly kind = 'WaitTimeout' as const;

  constructor(readonly waitingFor: string, readonly port: number, readonly elapsedMs: number) {
    super(`Timed out after ${elapsedMs}ms waiting for ${waitingFor} on port ${port}`);
  }
}

export class ProcessError extends ReplSetError {
  readonly kind = 'ProcessError' as const;

  constructor(message: string, readonly port?: number) {
    super(message);
  }
}

export function isReplSetError(error: unknown): error is ReplSetError {
  return error instanceof ReplSetError;
}

export function isQuorumTransient(error: unknown): error is NodeNotFoundError {
  return isReplSetError(error) && error.kind === 'QuorumTransient';
}

export function isConnectivityTransient(error: unknown): error is ConnectivityLostError {
  return isReplSetError(error) && error.kind === 'ConnectivityTransient';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
