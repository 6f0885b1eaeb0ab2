// src/inim/zone-classifier.ts
// Guess what kind of sensor a zone is from its (mostly Italian) installer-given name.

export type ZoneDeviceClass = 'door' | 'window' | 'motion' | 'tamper' | 'opening';

interface ZoneKeywordRule {
	deviceClass: ZoneDeviceClass;
	keywords: readonly string[];
}

/**
 * Evaluated top to bottom; the first rule with a keyword contained in the
 * lower-cased name wins. Tamper and motion come first because installers
 * often prefix them with a room name.
 */
export const ZONE_KEYWORD_RULES: readonly ZoneKeywordRule[] = [
	{ deviceClass: 'tamper', keywords: ['tamper', 'sirena'] },
	{ deviceClass: 'motion', keywords: ['pir', 'movimento', 'motion', 'volumetrico'] },
	{ deviceClass: 'door', keywords: ['porta', 'ingr', 'scorr', 'door', 'gate', 'cancell'] },
	{
		deviceClass: 'window',
		// Room names: those rooms are usually protected by window contacts.
		keywords: [
			'finestra', 'f.', 'f:', 'window', 'cam.', 'bagno', 'cucina',
			'salotto', 'studio', 'palestra', 'svago', 'quadro',
		],
	},
];

export function classifyZone(name: string): ZoneDeviceClass {
	const lower = name.toLowerCase();
	for (const rule of ZONE_KEYWORD_RULES) {
		if (rule.keywords.some((keyword) => lower.includes(keyword))) {
			return rule.deviceClass;
		}
	}
	return 'opening';
}
