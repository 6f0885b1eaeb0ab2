import { parseInimPlatformConfig } from '../src/inim/platform-config.js';

const base = { platform: 'InimCloud', email: 'user@example.com', password: 'test-secret' };

describe('parseInimPlatformConfig', () => {
	it('applies defaults to a minimal block', () => {
		const parsed = parseInimPlatformConfig({ ...base, email: ' user@example.com ', password: ' test-secret ' });

		expect(parsed.warnings).toEqual([]);
		expect(parsed.config).toEqual({
			name: 'INIM Cloud',
			credentials: { email: 'user@example.com', password: ' test-secret ' },
			deviceId: null,
			scanIntervalSeconds: 30,
			requestTimeoutSeconds: 15,
			scenarioOverrides: {},
			exposeBypassSwitches: true,
			exposeScenarioSwitches: false,
		});
	});

	it('accepts username in place of email', () => {
		const parsed = parseInimPlatformConfig({ username: 'other@example.com', password: 'test-secret' });
		expect(parsed.config?.credentials.email).toBe('other@example.com');
	});

	it.each([
		[{ email: 'user@example.com' }],
		[{ password: 'test-secret' }],
		[{ email: '   ', password: 'test-secret' }],
	])('returns no config without credentials (%p)', (raw) => {
		expect(parseInimPlatformConfig(raw)).toEqual({
			config: null,
			warnings: ['INIM Cloud "email" and "password" are required; the platform stays idle.'],
		});
	});

	it.each([
		[5, 10],
		[600, 300],
	])('clamps scanInterval %p to %p', (scanInterval, expected) => {
		const parsed = parseInimPlatformConfig({ ...base, scanInterval });

		expect(parsed.config?.scanIntervalSeconds).toBe(expected);
		expect(parsed.warnings).toEqual([`"scanInterval" ${scanInterval}s is outside 10-300s; using ${expected}s`]);
	});

	it('reads numeric strings and ignores non-integers', () => {
		expect(parseInimPlatformConfig({ ...base, scanInterval: '45' }).config?.scanIntervalSeconds).toBe(45);

		const parsed = parseInimPlatformConfig({ ...base, scanInterval: 'abc' });
		expect(parsed.config?.scanIntervalSeconds).toBe(30);
		expect(parsed.warnings).toEqual(['"scanInterval" must be a whole number; ignoring "abc"']);
	});

	it('resets a request timeout below one second', () => {
		const parsed = parseInimPlatformConfig({ ...base, requestTimeout: 0 });

		expect(parsed.config?.requestTimeoutSeconds).toBe(15);
		expect(parsed.warnings).toEqual(['"requestTimeout" must be at least 1s; using 15s']);
	});

	it('reads scenario overrides and the panel id', () => {
		const parsed = parseInimPlatformConfig({
			...base,
			armAwayScenario: 1,
			armHomeScenario: '3',
			disarmScenario: 2,
			deviceId: 4242,
		});

		expect(parsed.config?.scenarioOverrides).toEqual({ armAway: 1, armHome: 3, disarm: 2 });
		expect(parsed.config?.deviceId).toBe(4242);
	});

	it('keeps the user code only when it is not blank', () => {
		expect(parseInimPlatformConfig({ ...base, userCode: '  ' }).config?.credentials.userCode).toBeUndefined();
		expect(parseInimPlatformConfig({ ...base, userCode: '1234' }).config?.credentials.userCode).toBe('1234');
	});

	it('reads the accessory switches', () => {
		const parsed = parseInimPlatformConfig({
			...base,
			name: 'Allarme',
			exposeBypassSwitches: false,
			exposeScenarioSwitches: true,
		});

		expect(parsed.config).toMatchObject({
			name: 'Allarme',
			exposeBypassSwitches: false,
			exposeScenarioSwitches: true,
		});
	});
});
