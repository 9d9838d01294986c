import { createLogger } from '@room-freeze/core';
import {
	type MembershipEntry,
	type RoomID,
	RoomState,
	type RoomStateSnapshot,
	type UserID,
} from '@room-freeze/room';
import { injectable } from 'tsyringe';

import type { FollowUpEvent, GovernanceStatus } from '../types';
import {
	buildFrozenMarker,
	buildPowerLevelsEvent,
} from '../utils/follow-up-events';
import { ConfigService } from './config.service';
import { FreezeStateService } from './freeze-state.service';

@injectable()
export class AdminSuccessionService {
	private readonly logger = createLogger('AdminSuccessionService');

	constructor(
		private readonly configService: ConfigService,
		private readonly freezeStateService: FreezeStateService,
	) {}

	/**
	 * Reacts to `departedUser` leaving (or being banned from) the room.
	 *
	 * When they were its last admin, either promotes the highest ranked joined
	 * user (if `promote_moderators` is on) or freezes the room. Returns the state
	 * event the host has to send, or undefined when nothing needs to happen.
	 */
	onUserDeparted(
		roomId: RoomID,
		snapshot: RoomStateSnapshot,
		departedUser: UserID,
	): FollowUpEvent | undefined {
		// frozen rooms only come back through an unfreeze
		if (this.freezeStateService.isFrozen(snapshot)) {
			return undefined;
		}

		const roomState = new RoomState(snapshot);
		const { adminPowerLevel } = this.configService;

		if (roomState.getPowerLevelForUser(departedUser) < adminPowerLevel) {
			return undefined;
		}

		const remaining = this.getRemainingMembers(roomState, departedUser);
		if (remaining.some(({ powerLevel }) => powerLevel >= adminPowerLevel)) {
			return undefined;
		}

		if (this.configService.promoteModerators) {
			const candidate = this.findPromotionCandidate(remaining);
			if (candidate) {
				this.logger.info(
					`Promoting ${candidate.userId} (power level ${candidate.powerLevel}) to admin of room ${roomId}`,
				);

				return buildPowerLevelsEvent(
					roomId,
					departedUser,
					roomState.powerLevels.toContentWith({
						users: { [candidate.userId]: adminPowerLevel },
					}),
				);
			}
		}

		this.logger.info(`Freezing room ${roomId}, ${departedUser} was its last admin`);

		return buildFrozenMarker(roomId, departedUser, true);
	}

	getGovernanceStatus(
		snapshot: RoomStateSnapshot,
		departedUser?: UserID,
	): GovernanceStatus {
		const remaining = this.getRemainingMembers(
			new RoomState(snapshot),
			departedUser,
		);

		if (
			remaining.some(
				({ powerLevel }) => powerLevel >= this.configService.adminPowerLevel,
			)
		) {
			return 'governed';
		}

		return this.configService.promoteModerators && remaining.length > 0
			? 'promotable'
			: 'orphaned';
	}

	// highest power level first, lowest user id on ties so every server picks the same user
	findPromotionCandidate(
		members: readonly MembershipEntry[],
	): MembershipEntry | undefined {
		const { adminPowerLevel } = this.configService;

		return members
			.filter(({ powerLevel }) => powerLevel < adminPowerLevel)
			.sort((a, b) => {
				if (a.powerLevel !== b.powerLevel) {
					return b.powerLevel - a.powerLevel;
				}
				if (a.userId === b.userId) {
					return 0;
				}
				return a.userId < b.userId ? -1 : 1;
			})
			.at(0);
	}

	private getRemainingMembers(roomState: RoomState, departedUser?: UserID) {
		return roomState
			.getJoinedMembers()
			.filter(({ userId }) => userId !== departedUser);
	}
}
