import {
	type PduPowerLevelsEventContent,
	PduPowerLevelsEventContentSchema,
	PowerLevelValueSchema,
} from '../types/events';
import type { UserID } from '../types/_common';

// centralize all power level values here
// whether there is an event or not, and whatever shape its content is in

export class PowerLevelEvent {
	static fromContent(content: unknown, creator?: UserID) {
		const parsed = PduPowerLevelsEventContentSchema.safeParse(content);

		return new PowerLevelEvent(
			parsed.success ? parsed.data : undefined,
			creator,
		);
	}

	static fromDefault(creator?: UserID) {
		return new PowerLevelEvent(undefined, creator);
	}

	private readonly users = new Map<UserID, number>();

	private constructor(
		private readonly _content: PduPowerLevelsEventContent | undefined,
		private readonly creator?: UserID,
	) {
		for (const [userId, value] of Object.entries(_content?.users ?? {})) {
			const level = PowerLevelValueSchema.safeParse(value);
			// unparsable entries count as if the user was not listed
			if (level.success) {
				this.users.set(userId, level.data);
			}
		}
	}

	exists() {
		return this._content !== undefined;
	}

	getUsersDefault() {
		return this._content?.users_default ?? 0;
	}

	getPowerLevelForUser(userId: UserID) {
		if (!this._content) {
			return this.creator === userId ? 100 : 0;
		}

		return this.users.get(userId) ?? this.getUsersDefault();
	}

	// users explicitly listed in the users map
	getUserLevels(): ReadonlyMap<UserID, number> {
		return this.users;
	}

	/**
	 * Derives the content of a new power levels event from this one. Every key
	 * other than `users` and `users_default` is copied as is.
	 *
	 * Listed users failing `keepUser` are dropped before `users` is merged in.
	 */
	toContentWith({
		users = {},
		usersDefault,
		keepUser = () => true,
	}: {
		users?: Record<UserID, number>;
		usersDefault?: number;
		keepUser?: (userId: UserID, level: number) => boolean;
	}): PduPowerLevelsEventContent & { users: Record<UserID, number> } {
		const base: PduPowerLevelsEventContent = this._content
			? structuredClone(this._content)
			: {};

		const kept = [...this.users].filter(([userId, level]) =>
			keepUser(userId, level),
		);

		const content = {
			...base,
			users: { ...Object.fromEntries(kept), ...users },
		};

		if (usersDefault !== undefined) {
			content.users_default = usersDefault;
		}

		return content;
	}
}
