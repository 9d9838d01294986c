import { z } from 'zod';

export const EventTypes = {
	Create: 'm.room.create',
	Member: 'm.room.member',
	PowerLevels: 'm.room.power_levels',
	Message: 'm.room.message',
	Frozen: 'org.matrix.room.frozen',
} as const;

// https://spec.matrix.org/v1.12/client-server-api/#mroommember

export const PduMembershipTypeSchema = z.enum([
	'join',
	'leave',
	'invite',
	'ban',
	'knock',
]);

export type Membership = z.infer<typeof PduMembershipTypeSchema>;

export const PduMembershipEventContentSchema = z.object({
	membership: PduMembershipTypeSchema,
	displayname: z.string().optional(),
	reason: z.string().optional(),
});

// https://spec.matrix.org/v1.12/rooms/v3/#mroompower_levels-events-accept-values-as-strings
// older room versions still carry string values, convert them at parse time
export const PowerLevelValueSchema = z.union([
	z.number().int(),
	z
		.string()
		.regex(/^[+-]?\d+$/)
		.transform((v) => Number.parseInt(v, 10)),
]);

// only users and users_default are read; every other key is carried over untouched
// when a new power levels event is derived from this one
export const PduPowerLevelsEventContentSchema = z
	.object({
		users: z.record(z.string(), z.unknown()).optional().catch(undefined),
		users_default: PowerLevelValueSchema.optional().catch(undefined),
	})
	.passthrough();

export type PduPowerLevelsEventContent = z.infer<
	typeof PduPowerLevelsEventContentSchema
>;

export const PduCreateEventContentSchema = z.object({
	creator: z.string().optional(),
	room_version: z.string().optional(),
});

export const FrozenEventContentSchema = z.object({
	frozen: z.boolean(),
});
