import type { StateEvent } from '@room-freeze/room';

// state event the host has to send into the room on top of admitting the checked one
export type FollowUpEvent = Omit<StateEvent, 'event_id'>;

export const DenyReasons = {
	RoomFrozen: 'room-frozen',
	BlacklistedServer: 'blacklisted-server',
} as const;

export type DenyReason = (typeof DenyReasons)[keyof typeof DenyReasons];

export type Decision =
	| { kind: 'allow' }
	| { kind: 'deny'; reason: DenyReason }
	| { kind: 'allow-with-follow-up'; events: readonly FollowUpEvent[] };

export type GovernanceStatus = 'governed' | 'promotable' | 'orphaned';

export interface CheckEventResult {
	allowed: boolean;
	reason?: DenyReason;
	followUps: FollowUpEvent[];
}
