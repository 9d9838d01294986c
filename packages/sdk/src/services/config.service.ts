import { createLogger } from '@room-freeze/core';
import { type UserID, isUserFromServer } from '@room-freeze/room';
import { injectable } from 'tsyringe';
import { z } from 'zod';

import { ConfigurationError } from '../errors';

// hostname, IPv4 or bracketed IPv6 literal, optionally followed by a port
export const ServerNameSchema = z
	.string()
	.regex(
		/^(?:[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)*|\[[0-9A-Fa-f:.]+\])(?::\d{1,5})?$/,
		'Invalid server name',
	);

export const RoomFreezeConfigSchema = z
	.object({
		unfreeze_blacklist: z.array(ServerNameSchema).default([]),
		promote_moderators: z.boolean().default(false),
		admin_power_level: z
			.number()
			.int()
			.positive('Admin power level must be positive')
			.default(100),
		moderator_power_level: z
			.number()
			.int()
			.nonnegative('Moderator power level must not be negative')
			.default(50),
		server_name: ServerNameSchema.optional(),
	})
	.strict()
	.refine((config) => config.moderator_power_level < config.admin_power_level, {
		message: 'Moderator power level must be lower than admin power level',
		path: ['moderator_power_level'],
	});

// what the host hands over, every key optional
export type RoomFreezeConfig = z.input<typeof RoomFreezeConfigSchema>;

type ParsedRoomFreezeConfig = z.output<typeof RoomFreezeConfigSchema>;

@injectable()
export class ConfigService {
	private config: Readonly<ParsedRoomFreezeConfig> | undefined;

	private blacklist: ReadonlySet<string> = new Set();

	private readonly logger = createLogger('ConfigService');

	setConfig(values: unknown) {
		try {
			const config = RoomFreezeConfigSchema.parse(values);

			this.config = Object.freeze(config);
			this.blacklist = new Set(config.unfreeze_blacklist);
		} catch (error) {
			if (error instanceof z.ZodError) {
				this.logger.error({
					msg: 'Configuration validation failed:',
					err: error,
				});
				throw new ConfigurationError(
					`Invalid configuration: ${error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
				);
			}
			throw error;
		}
	}

	private get values(): Readonly<ParsedRoomFreezeConfig> {
		if (!this.config) {
			throw new ConfigurationError('Configuration has not been set');
		}

		return this.config;
	}

	get unfreezeBlacklist(): ReadonlySet<string> {
		return this.blacklist;
	}

	get promoteModerators(): boolean {
		return this.values.promote_moderators;
	}

	get adminPowerLevel(): number {
		return this.values.admin_power_level;
	}

	get moderatorPowerLevel(): number {
		return this.values.moderator_power_level;
	}

	get serverName(): string | undefined {
		return this.values.server_name;
	}

	isServerBlacklisted(serverName: string): boolean {
		return this.blacklist.has(serverName);
	}

	// without a server name every user counts as local
	isLocalUser(userId: UserID): boolean {
		const { serverName } = this;

		return serverName === undefined || isUserFromServer(userId, serverName);
	}
}
