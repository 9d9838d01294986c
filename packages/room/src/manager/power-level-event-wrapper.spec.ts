import { PowerLevelEvent } from './power-level-event-wrapper';

describe('PowerLevelEvent', () => {
	const admin = '@admin:example.com';
	const mod = '@mod:example.com';

	it('should give the creator 100 when there is no power levels event', () => {
		const powerLevels = PowerLevelEvent.fromDefault(admin);

		expect(powerLevels.exists()).toBe(false);
		expect(powerLevels.getPowerLevelForUser(admin)).toBe(100);
		expect(powerLevels.getPowerLevelForUser(mod)).toBe(0);
	});

	it('should read users and fall back to users_default', () => {
		const powerLevels = PowerLevelEvent.fromContent({
			users: { [admin]: 100, [mod]: 50 },
			users_default: 10,
		});

		expect(powerLevels.getPowerLevelForUser(admin)).toBe(100);
		expect(powerLevels.getPowerLevelForUser(mod)).toBe(50);
		expect(powerLevels.getPowerLevelForUser('@guest:example.com')).toBe(10);
	});

	it('should accept string values from older room versions', () => {
		const powerLevels = PowerLevelEvent.fromContent({
			users: { [admin]: '100' },
			users_default: '5',
		});

		expect(powerLevels.getPowerLevelForUser(admin)).toBe(100);
		expect(powerLevels.getUsersDefault()).toBe(5);
	});

	it('should ignore malformed entries instead of failing', () => {
		const powerLevels = PowerLevelEvent.fromContent({
			users: { [admin]: 'lots', [mod]: 50 },
			users_default: { nope: true },
		});

		expect(powerLevels.exists()).toBe(true);
		expect(powerLevels.getPowerLevelForUser(admin)).toBe(0);
		expect(powerLevels.getPowerLevelForUser(mod)).toBe(50);
		expect([...powerLevels.getUserLevels().keys()]).toEqual([mod]);
	});

	it('should treat non object content as a missing event', () => {
		const powerLevels = PowerLevelEvent.fromContent('not-an-object', admin);

		expect(powerLevels.exists()).toBe(false);
		expect(powerLevels.getPowerLevelForUser(admin)).toBe(100);
	});

	describe('toContentWith', () => {
		it('should keep every other key and merge the user overrides', () => {
			const original = {
				ban: 50,
				events: { 'm.room.name': 50 },
				users: { [admin]: 100, [mod]: 50 },
				users_default: 0,
			};
			const powerLevels = PowerLevelEvent.fromContent(original);

			expect(powerLevels.toContentWith({ users: { [mod]: 100 } })).toEqual({
				ban: 50,
				events: { 'm.room.name': 50 },
				users: { [admin]: 100, [mod]: 100 },
				users_default: 0,
			});
			// the source content is left alone
			expect(original.users[mod]).toBe(50);
		});

		it('should override users_default when asked to', () => {
			const powerLevels = PowerLevelEvent.fromContent({
				users: {},
				users_default: 100,
			});

			expect(powerLevels.toContentWith({ usersDefault: 0 })).toEqual({
				users: {},
				users_default: 0,
			});
		});

		it('should drop the users it is told not to keep', () => {
			const powerLevels = PowerLevelEvent.fromContent({
				ban: 50,
				users: { [admin]: 100, [mod]: 50 },
			});

			expect(
				powerLevels.toContentWith({
					usersDefault: 100,
					keepUser: (_userId, level) => level >= 100,
				}),
			).toEqual({ ban: 50, users: { [admin]: 100 }, users_default: 100 });
		});

		it('should build a content from nothing when there is no event', () => {
			expect(
				PowerLevelEvent.fromDefault().toContentWith({ users: { [admin]: 100 } }),
			).toEqual({ users: { [admin]: 100 } });
		});
	});
});
