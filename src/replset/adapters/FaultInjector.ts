import { EventEmitter } from 'eventemitter3';
import { ReplSetError } from '../errors';

export type StopFailureMode = 'unclean' | 'throw';

export interface FaultEvents {
  'fault-injected': [{ type: string; target: string }];
  'fault-triggered': [{ type: string; target: string; remaining: number }];
}

interface CommandFault {
  error: () => ReplSetError;
  remaining: number;
}

/**
 * Scripted failures for the in-memory replica network.
 *
 * Each fault is armed for a number of occurrences and consumed as the
 * simulated members hit it.
 */
export class FaultInjector extends EventEmitter<FaultEvents> {
  private readonly commandFaults = new Map<string, CommandFault>();
  private readonly stopFailures = new Map<number, StopFailureMode>();
  private readonly roleDelays = new Map<number, number>();
  private readonly connectivityLosses = new Map<number, number>();
  private readonly unreachable = new Set<number>();

  /**
   * Make the next `times` runs of `commandName` fail with the error built by `error`
   */
  failCommand(commandName: string, error: () => ReplSetError, times: number = 1): void {
    this.commandFaults.set(commandName, { error, remaining: times });
    this.emit('fault-injected', { type: 'command', target: commandName });
  }

  failStop(port: number, mode: StopFailureMode = 'unclean'): void {
    this.stopFailures.set(port, mode);
    this.emit('fault-injected', { type: 'stop', target: String(port) });
  }

  /**
   * The member on `port` reports neither role for its next `polls` role queries
   */
  delayRole(port: number, polls: number): void {
    this.roleDelays.set(port, polls);
    this.emit('fault-injected', { type: 'role-delay', target: String(port) });
  }

  /**
   * The next `times` commands against `port` fail as if the connection dropped
   */
  dropConnectivity(port: number, times: number = 1): void {
    this.connectivityLosses.set(port, times);
    this.emit('fault-injected', { type: 'connectivity', target: String(port) });
  }

  /**
   * `awaitReady` on the member fails until `restore` is called
   */
  makeUnreachable(port: number): void {
    this.unreachable.add(port);
    this.emit('fault-injected', { type: 'unreachable', target: String(port) });
  }

  restore(port: number): void {
    this.unreachable.delete(port);
    this.roleDelays.delete(port);
    this.connectivityLosses.delete(port);
    this.stopFailures.delete(port);
  }

  takeCommandFault(commandName: string): ReplSetError | undefined {
    const fault = this.commandFaults.get(commandName);
    if (!fault) return undefined;

    fault.remaining -= 1;
    if (fault.remaining <= 0) {
      this.commandFaults.delete(commandName);
    }
    this.emit('fault-triggered', { type: 'command', target: commandName, remaining: fault.remaining });
    return fault.error();
  }

  takeRoleDelay(port: number): boolean {
    return this.consume(this.roleDelays, port, 'role-delay');
  }

  takeConnectivityLoss(port: number): boolean {
    return this.consume(this.connectivityLosses, port, 'connectivity');
  }

  stopFailure(port: number): StopFailureMode | undefined {
    return this.stopFailures.get(port);
  }

  isUnreachable(port: number): boolean {
    return this.unreachable.has(port);
  }

  clear(): void {
    this.commandFaults.clear();
    this.stopFailures.clear();
    this.roleDelays.clear();
    this.connectivityLosses.clear();
    this.unreachable.clear();
  }

  private consume(counters: Map<number, number>, port: number, type: string): boolean {
    const remaining = counters.get(port);
    if (remaining === undefined || remaining <= 0) return false;

    if (remaining === 1) {
      counters.delete(port);
    } else {
      counters.set(port, remaining - 1);
    }
    this.emit('fault-triggered', { type, target: String(port), remaining: remaining - 1 });
    return true;
  }
}
