import {
	EventTypes,
	PduMembershipEventContentSchema,
	type RoomEvent,
	type RoomID,
	type RoomStateSnapshot,
	type UserID,
} from '@room-freeze/room';
import { injectable } from 'tsyringe';

import { AdminSuccessionService } from './services/admin-succession.service';
import { EventAdmissionService } from './services/event-admission.service';
import { FreezeStateService } from './services/freeze-state.service';
import type { CheckEventResult, FollowUpEvent } from './types';

// the surface a host wires its event hooks to
@injectable()
export class RoomFreezeSDK {
	constructor(
		private readonly freezeStateService: FreezeStateService,
		private readonly eventAdmissionService: EventAdmissionService,
		private readonly adminSuccessionService: AdminSuccessionService,
	) {}

	isFrozen(...args: Parameters<typeof this.freezeStateService.isFrozen>) {
		return this.freezeStateService.isFrozen(...args);
	}

	canSendEvent(
		...args: Parameters<typeof this.eventAdmissionService.canSendEvent>
	) {
		return this.eventAdmissionService.canSendEvent(...args);
	}

	onUserDeparted(
		...args: Parameters<typeof this.adminSuccessionService.onUserDeparted>
	) {
		return this.adminSuccessionService.onUserDeparted(...args);
	}

	getGovernanceStatus(
		...args: Parameters<typeof this.adminSuccessionService.getGovernanceStatus>
	) {
		return this.adminSuccessionService.getGovernanceStatus(...args);
	}

	/**
	 * Single pre-persist hook: admission check with the sender as actor, then
	 * succession planning when the admitted event takes a user out of the room.
	 * `snapshot` is the state before `event`.
	 *
	 * Follow-ups are meant to be sent in order, before `event` is persisted. A
	 * freeze, requested or planned, is preceded by the power levels that let the
	 * remaining members unfreeze the room.
	 */
	checkEventAllowed(
		event: RoomEvent,
		snapshot: RoomStateSnapshot,
	): CheckEventResult {
		const decision = this.eventAdmissionService.canSendEvent(
			event,
			snapshot,
			event.sender,
		);

		if (decision.kind === 'deny') {
			return { allowed: false, reason: decision.reason, followUps: [] };
		}

		const followUps =
			decision.kind === 'allow-with-follow-up' ? [...decision.events] : [];

		if (
			this.freezeStateService.isFrozenMarker(event) &&
			this.freezeStateService.parseFrozenContent(event.content) === true
		) {
			const powerLevels = this.eventAdmissionService.onFreeze(
				event.room_id,
				snapshot,
				event.sender,
			);
			if (powerLevels) {
				followUps.push(powerLevels);
			}
		}

		const departedUser = this.getDepartedUser(event);
		if (departedUser) {
			followUps.push(
				...this.planSuccession(event.room_id, snapshot, departedUser),
			);
		}

		return { allowed: true, followUps };
	}

	private planSuccession(
		roomId: RoomID,
		snapshot: RoomStateSnapshot,
		departedUser: UserID,
	): FollowUpEvent[] {
		const followUp = this.adminSuccessionService.onUserDeparted(
			roomId,
			snapshot,
			departedUser,
		);
		if (!followUp) {
			return [];
		}

		if (!this.freezeStateService.isFrozenMarker(followUp)) {
			return [followUp];
		}

		const powerLevels = this.eventAdmissionService.onFreeze(
			roomId,
			snapshot,
			departedUser,
		);

		return powerLevels ? [powerLevels, followUp] : [followUp];
	}

	private getDepartedUser(event: RoomEvent): UserID | undefined {
		if (event.type !== EventTypes.Member || !event.state_key) {
			return undefined;
		}

		const content = PduMembershipEventContentSchema.safeParse(event.content);
		if (!content.success) {
			return undefined;
		}

		const { membership } = content.data;

		return membership === 'leave' || membership === 'ban'
			? event.state_key
			: undefined;
	}
}
