import { MembershipFailureKind } from '../../subscription/interfaces/subscription.interface';

export const GROUP_MEMBERSHIP_PLATFORM = Symbol('GROUP_MEMBERSHIP_PLATFORM');

export type MembershipResult =
  | { ok: true; attempts: number }
  | { ok: false; kind: MembershipFailureKind; reason: string; attempts: number };

/**
 * Raw add/remove operations against the messaging platform. Implementations
 * resolve when the user is (or already was) in the requested state and throw
 * MembershipPlatformError otherwise. Once `signal` aborts, no further platform
 * requests are made for the call.
 */
export interface GroupMembershipPlatform {
  addMember(userId: string, signal?: AbortSignal): Promise<void>;
  removeMember(userId: string, signal?: AbortSignal): Promise<void>;
}
