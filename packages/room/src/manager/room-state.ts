import { getStateByMapKey } from '../state/definitions';
import type { RoomStateSnapshot, UserID } from '../types/_common';
import {
	EventTypes,
	type Membership,
	PduCreateEventContentSchema,
	PduMembershipEventContentSchema,
} from '../types/events';
import { PowerLevelEvent } from './power-level-event-wrapper';

export interface MembershipEntry {
	userId: UserID;
	membership: Membership;
	powerLevel: number;
}

// RoomState is an accessor to help with reading room properties from the state snapshot the host hands over
export class RoomState {
	private _powerLevels: PowerLevelEvent | undefined;

	constructor(private readonly stateMap: RoomStateSnapshot) {}

	// who created the room, room versions 11+ dropped content.creator in favour of the sender
	get creator(): UserID | undefined {
		const createEvent = getStateByMapKey(this.stateMap, {
			type: EventTypes.Create,
		});
		if (!createEvent) {
			return undefined;
		}

		const content = PduCreateEventContentSchema.safeParse(createEvent.content);

		return (content.success && content.data.creator) || createEvent.sender;
	}

	get powerLevels(): PowerLevelEvent {
		if (!this._powerLevels) {
			const powerLevelsEvent = getStateByMapKey(this.stateMap, {
				type: EventTypes.PowerLevels,
			});

			this._powerLevels = powerLevelsEvent
				? PowerLevelEvent.fromContent(powerLevelsEvent.content, this.creator)
				: PowerLevelEvent.fromDefault(this.creator);
		}

		return this._powerLevels;
	}

	getUserMembership(userId: UserID): Membership | undefined {
		const membershipEvent = getStateByMapKey(this.stateMap, {
			type: EventTypes.Member,
			state_key: userId,
		});
		if (!membershipEvent) {
			return undefined; // never been a member
		}

		const content = PduMembershipEventContentSchema.safeParse(
			membershipEvent.content,
		);

		return content.success ? content.data.membership : undefined;
	}

	getPowerLevelForUser(userId: UserID): number {
		return this.powerLevels.getPowerLevelForUser(userId);
	}

	getMembers(): MembershipEntry[] {
		const members: MembershipEntry[] = [];

		for (const event of this.stateMap.values()) {
			if (event.type !== EventTypes.Member) {
				continue;
			}

			const membership = this.getUserMembership(event.state_key);
			if (!membership) {
				continue;
			}

			members.push({
				userId: event.state_key,
				membership,
				powerLevel: this.getPowerLevelForUser(event.state_key),
			});
		}

		return members;
	}

	getJoinedMembers(): MembershipEntry[] {
		return this.getMembers().filter(({ membership }) => membership === 'join');
	}
}
