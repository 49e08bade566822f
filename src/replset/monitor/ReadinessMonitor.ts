import { EventEmitter } from 'eventemitter3';
import { Clock, systemClock } from '../../common/Clock';
import { FixtureLogger, createLogger } from '../../common/logger';
import { ClusterClient, NodeProcess } from '../client/types';
import { ADMIN_DB, MemberRole, parseRole, roleQuery } from '../client/commands';
import { WaitTimeoutError } from '../errors';

export interface ReadinessMonitorConfig {
  pollIntervalMs?: number;
  clock?: Clock;
  logger?: FixtureLogger;
}

export interface WaitOptions {
  /**
   * Give up after this many milliseconds; without it the wait is unbounded
   * and the caller's own timeout is the only way out
   */
  deadlineMs?: number;
}

export interface ReadinessEvents {
  'leader-confirmed': [{ id: number; port: number; polls: number }];
  'follower-confirmed': [{ id: number; port: number; polls: number }];
}

type RoleName = 'primary' | 'secondary';

/**
 * Polls members until they report the role the fixture expects them to
 * hold right after start-up: node 0 primary, everyone else secondary.
 */
export class ReadinessMonitor extends EventEmitter<ReadinessEvents> {
  private readonly pollIntervalMs: number;
  private readonly clock: Clock;
  private readonly logger: FixtureLogger;

  constructor(config: ReadinessMonitorConfig = {}) {
    super();
    this.pollIntervalMs = config.pollIntervalMs ?? 100;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? createLogger('readiness');
  }

  /**
   * Block until `node` reports itself primary
   */
  async awaitLeader(node: NodeProcess, options: WaitOptions = {}): Promise<void> {
    const polls = await this.awaitRole(node, 'primary', node.client(), options);
    this.logger.info(`Primary on port ${node.port} successfully elected.`);
    this.emit('leader-confirmed', { id: node.id, port: node.port, polls });
  }

  /**
   * Block until each node reports itself secondary, one after the other in
   * list order. The deadline, when given, applies to each node separately.
   */
  async awaitFollowers(nodes: NodeProcess[], options: WaitOptions = {}): Promise<void> {
    for (const node of nodes) {
      // A secondary read preference keeps the probe itself independent of the primary
      const polls = await this.awaitRole(node, 'secondary', node.client('secondary'), options);
      this.logger.info(`Secondary on port ${node.port} is now available.`);
      this.emit('follower-confirmed', { id: node.id, port: node.port, polls });
    }
  }

  async queryRole(client: ClusterClient): Promise<MemberRole> {
    return parseRole(await client.runCommand(ADMIN_DB, roleQuery()));
  }

  private async awaitRole(
    node: NodeProcess,
    role: RoleName,
    client: ClusterClient,
    options: WaitOptions
  ): Promise<number> {
    const start = this.clock.now();
    const waitingFor = role === 'primary' ? `primary on port ${node.port} to be elected` : `secondary on port ${node.port} to become available`;

    try {
      for (let polls = 1; ; polls++) {
        if (polls === 1) {
          this.logger.info(`Waiting for ${waitingFor}.`);
        } else {
          this.logger.debug(`Still waiting for ${waitingFor} (poll ${polls}).`);
        }

        const current = await this.queryRole(client);
        if (role === 'primary' ? current.isLeader : current.isFollower) {
          return polls;
        }

        const elapsed = this.clock.now() - start;
        if (options.deadlineMs !== undefined && elapsed >= options.deadlineMs) {
          throw new WaitTimeoutError(role, node.port, elapsed);
        }
        await this.clock.sleep(this.pollIntervalMs);
      }
    } finally {
      await client.close();
    }
  }
}
