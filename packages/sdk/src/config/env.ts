import { z } from 'zod';

import { ConfigurationError } from '../errors';
import type { RoomFreezeConfig } from '../services/config.service';

const optionalInteger = z
	.string()
	.optional()
	.transform((v) => (v === undefined || v === '' ? undefined : Number(v)));

const EnvSchema = z.object({
	ROOM_FREEZE_UNFREEZE_BLACKLIST: z
		.string()
		.optional()
		.transform((v) =>
			(v ?? '')
				.split(',')
				.map((server) => server.trim())
				.filter((server) => server.length > 0),
		),
	ROOM_FREEZE_PROMOTE_MODERATORS: z
		.enum(['true', 'false'])
		.optional()
		.transform((v) => v === 'true'),
	ROOM_FREEZE_ADMIN_POWER_LEVEL: optionalInteger,
	ROOM_FREEZE_MODERATOR_POWER_LEVEL: optionalInteger,
	ROOM_FREEZE_SERVER_NAME: z.string().optional(),
});

/**
 * Maps `ROOM_FREEZE_*` environment variables onto the module configuration.
 * Values are only shaped here, `ConfigService.setConfig` validates them.
 */
export function readConfigFromEnv(
	env: NodeJS.ProcessEnv = process.env,
): RoomFreezeConfig {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		throw new ConfigurationError(
			`Invalid environment: ${parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
		);
	}

	const {
		ROOM_FREEZE_UNFREEZE_BLACKLIST: unfreezeBlacklist,
		ROOM_FREEZE_PROMOTE_MODERATORS: promoteModerators,
		ROOM_FREEZE_ADMIN_POWER_LEVEL: adminPowerLevel,
		ROOM_FREEZE_MODERATOR_POWER_LEVEL: moderatorPowerLevel,
		ROOM_FREEZE_SERVER_NAME: serverName,
	} = parsed.data;

	return {
		unfreeze_blacklist: unfreezeBlacklist,
		promote_moderators: promoteModerators,
		...(adminPowerLevel !== undefined
			? { admin_power_level: adminPowerLevel }
			: {}),
		...(moderatorPowerLevel !== undefined
			? { moderator_power_level: moderatorPowerLevel }
			: {}),
		...(serverName ? { server_name: serverName } : {}),
	};
}
