import { MemberDescriptor, TopologyPolicy } from '../types';

/** Only 7 members of a replica set may vote */
export const MAX_VOTING_MEMBERS = 7;

/**
 * Build the `members` array for a set whose nodes live at `hosts`.
 *
 * Member 0 is always a voter with the default priority. The others are
 * made unelectable unless `allNodesElectable`, and vote only when
 * `votingSecondaries` and their index is below the voting ceiling; voters
 * past the ceiling are demoted, not rejected. A hidden initial sync member,
 * when given, is appended with the next id.
 */
export function buildMembers(
  hosts: string[],
  policy: TopologyPolicy,
  hiddenSyncHost?: string
): MemberDescriptor[] {
  if (hosts.length < 1) {
    throw new Error('A replica set needs at least one node');
  }

  const members: MemberDescriptor[] = hosts.map((host, index) => {
    if (index === 0) {
      return { _id: 0, host, votes: 1 };
    }

    const member: MemberDescriptor = { _id: index, host, votes: 1 };
    if (!policy.allNodesElectable) {
      member.priority = 0;
    }
    if (index >= MAX_VOTING_MEMBERS || !policy.votingSecondaries) {
      member.votes = 0;
    }
    return member;
  });

  if (hiddenSyncHost !== undefined) {
    members.push({
      _id: hosts.length,
      host: hiddenSyncHost,
      priority: 0,
      hidden: true,
      votes: 0
    });
  }

  return members;
}

export function countVotingMembers(members: MemberDescriptor[]): number {
  return members.filter(member => member.votes === 1).length;
}
