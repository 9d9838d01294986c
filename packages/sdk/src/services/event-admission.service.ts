import { isDeepStrictEqual } from 'node:util';

import { createLogger } from '@room-freeze/core';
import {
	EventTypes,
	PduMembershipEventContentSchema,
	PowerLevelEvent,
	type RoomEvent,
	type RoomID,
	RoomState,
	type RoomStateSnapshot,
	type UserID,
	extractDomainFromId,
	getStateByMapKey,
} from '@room-freeze/room';
import { injectable } from 'tsyringe';

import type { Decision, FollowUpEvent } from '../types';
import { DenyReasons } from '../types';
import { allow, allowWithFollowUp, deny } from '../utils/decision';
import { buildPowerLevelsEvent } from '../utils/follow-up-events';
import { ConfigService } from './config.service';
import { FreezeStateService } from './freeze-state.service';

function withoutUserLevels(content: Record<string, unknown>) {
	const { users, users_default, ...rest } = content;
	return rest;
}

@injectable()
export class EventAdmissionService {
	private readonly logger = createLogger('EventAdmissionService');

	constructor(
		private readonly configService: ConfigService,
		private readonly freezeStateService: FreezeStateService,
	) {}

	/**
	 * Decides whether `candidate` may enter the room described by `snapshot`.
	 *
	 * Unfrozen rooms are left to the host's own authorization. In a frozen room
	 * only self leaves, frozen marker changes and the power levels written by an
	 * unfreeze go through.
	 */
	canSendEvent(
		candidate: RoomEvent,
		snapshot: RoomStateSnapshot,
		actingUser: UserID,
	): Decision {
		if (!this.freezeStateService.isFrozen(snapshot)) {
			return allow();
		}

		// users can always leave; kicks are not leaves though
		if (this.isSelfLeave(candidate, actingUser)) {
			return allow();
		}

		if (this.freezeStateService.isFrozenMarker(candidate)) {
			const frozen = this.freezeStateService.parseFrozenContent(
				candidate.content,
			);
			if (frozen !== undefined) {
				return this.onFrozenStateChange(frozen, candidate, snapshot, actingUser);
			}

			this.logger.debug(
				`Malformed ${EventTypes.Frozen} event from ${actingUser} in frozen room ${candidate.room_id}`,
			);
		}

		if (this.isTakeoverPowerLevels(candidate, snapshot, actingUser)) {
			const serverName = this.getBlacklistedServer(actingUser);
			if (serverName) {
				this.logger.info(
					`Rejecting takeover power levels in room ${candidate.room_id} by ${actingUser}: ${serverName} is blacklisted`,
				);
				return deny(DenyReasons.BlacklistedServer);
			}

			return allow();
		}

		this.logger.info(
			`Rejecting ${candidate.type} from ${actingUser}: room ${candidate.room_id} is frozen`,
		);

		return deny(DenyReasons.RoomFrozen);
	}

	private onFrozenStateChange(
		frozen: boolean,
		candidate: RoomEvent,
		snapshot: RoomStateSnapshot,
		actingUser: UserID,
	): Decision {
		if (frozen) {
			// already frozen, nothing changes
			return allow();
		}

		const serverName = this.getBlacklistedServer(actingUser);
		if (serverName) {
			this.logger.info(
				`Rejecting unfreeze of room ${candidate.room_id} by ${actingUser}: ${serverName} is blacklisted`,
			);
			return deny(DenyReasons.BlacklistedServer);
		}

		// the remote user's own server sends the power levels for them
		if (!this.configService.isLocalUser(actingUser)) {
			return allow();
		}

		this.logger.info(
			`Room ${candidate.room_id} unfrozen by ${actingUser}, handing over administration`,
		);

		return allowWithFollowUp([
			buildPowerLevelsEvent(
				candidate.room_id,
				actingUser,
				this.getTakeoverContent(new RoomState(snapshot), actingUser),
			),
		]);
	}

	/**
	 * Power levels to send alongside a freeze of an unfrozen room: admins stay,
	 * everyone else is unlisted and `users_default` grants admin, so any member
	 * left can unfreeze it later. Nothing for refreezes or remote actors.
	 */
	onFreeze(
		roomId: RoomID,
		snapshot: RoomStateSnapshot,
		actingUser: UserID,
	): FollowUpEvent | undefined {
		if (
			this.freezeStateService.isFrozen(snapshot) ||
			!this.configService.isLocalUser(actingUser)
		) {
			return undefined;
		}

		const { adminPowerLevel } = this.configService;

		this.logger.info(
			`Room ${roomId} frozen by ${actingUser}, opening unfreeze to every member`,
		);

		return buildPowerLevelsEvent(
			roomId,
			actingUser,
			new RoomState(snapshot).powerLevels.toContentWith({
				usersDefault: adminPowerLevel,
				keepUser: (_userId, level) => level >= adminPowerLevel,
			}),
		);
	}

	// actor becomes the only admin; every other admin drops to moderator
	private getTakeoverContent(roomState: RoomState, actingUser: UserID) {
		const { adminPowerLevel, moderatorPowerLevel } = this.configService;
		const powerLevels = roomState.powerLevels;

		const users: Record<UserID, number> = {};
		for (const [userId, level] of powerLevels.getUserLevels()) {
			if (userId !== actingUser && level >= adminPowerLevel) {
				users[userId] = moderatorPowerLevel;
			}
		}
		users[actingUser] = adminPowerLevel;

		return powerLevels.toContentWith({
			users,
			usersDefault:
				powerLevels.getUsersDefault() >= adminPowerLevel ? 0 : undefined,
		});
	}

	private getBlacklistedServer(actingUser: UserID): string | undefined {
		const serverName = extractDomainFromId(actingUser);

		return serverName && this.configService.isServerBlacklisted(serverName)
			? serverName
			: undefined;
	}

	private isSelfLeave(candidate: RoomEvent, actingUser: UserID): boolean {
		if (
			candidate.type !== EventTypes.Member ||
			candidate.state_key !== actingUser
		) {
			return false;
		}

		const content = PduMembershipEventContentSchema.safeParse(candidate.content);

		return content.success && content.data.membership === 'leave';
	}

	/**
	 * The power levels event that goes with an unfreeze can reach the host before
	 * the frozen marker itself, so it has to be let through while the room is
	 * still frozen. It must leave the actor as the only admin and change nothing
	 * but the user levels.
	 */
	private isTakeoverPowerLevels(
		candidate: RoomEvent,
		snapshot: RoomStateSnapshot,
		actingUser: UserID,
	): boolean {
		if (
			candidate.type !== EventTypes.PowerLevels ||
			candidate.state_key !== '' ||
			candidate.sender !== actingUser
		) {
			return false;
		}

		const { adminPowerLevel } = this.configService;
		const proposed = PowerLevelEvent.fromContent(candidate.content);

		if (
			!proposed.exists() ||
			proposed.getPowerLevelForUser(actingUser) !== adminPowerLevel ||
			proposed.getUsersDefault() >= adminPowerLevel
		) {
			return false;
		}

		for (const [userId, level] of proposed.getUserLevels()) {
			if (userId !== actingUser && level >= adminPowerLevel) {
				return false;
			}
		}

		const current = getStateByMapKey(snapshot, {
			type: EventTypes.PowerLevels,
		});

		return isDeepStrictEqual(
			withoutUserLevels(current?.content ?? {}),
			withoutUserLevels(candidate.content),
		);
	}
}
