import { CommandDocument, CommandResponse } from './types';
import { ReplicaSetConfig } from '../types';
import { isPlainObject } from '../../common/utils';

export const ADMIN_DB = 'admin';

export interface MemberRole {
  isLeader: boolean;
  isFollower: boolean;
}

export const roleQuery = (): CommandDocument => ({ isMaster: 1 });

export const initiateCommand = (config: ReplicaSetConfig): CommandDocument => ({ replSetInitiate: config });

export const reconfigCommand = (config: ReplicaSetConfig): CommandDocument => ({ replSetReconfig: config });

export const refreshSessionCacheCommand = (): CommandDocument => ({ refreshLogicalSessionCacheNow: 1 });

export const serverStatusCommand = (): CommandDocument => ({ serverStatus: 1 });

export const cmdLineOptsCommand = (): CommandDocument => ({ getCmdLineOpts: 1 });

/**
 * Name of a command document, i.e. its first key
 */
export function commandName(command: CommandDocument): string {
  return Object.keys(command)[0] ?? '<empty>';
}

export function parseRole(response: CommandResponse): MemberRole {
  return {
    isLeader: response.ismaster === true,
    isFollower: response.secondary === true
  };
}

/**
 * Whether writes on the member are durable: its storage engine is persistent
 * and journaling was not switched off on the command line.
 */
export function isDurableStorage(serverStatus: CommandResponse, cmdLineOpts: CommandResponse): boolean {
  const engine = serverStatus.storageEngine;
  const persistent = isPlainObject(engine) && engine.persistent === true;

  const parsed = isPlainObject(cmdLineOpts.parsed) ? cmdLineOpts.parsed : {};
  const storage = isPlainObject(parsed.storage) ? parsed.storage : {};
  const journal = isPlainObject(storage.journal) ? storage.journal : {};
  const journalEnabled = journal.enabled !== false;

  return persistent && journalEnabled;
}
