// src/settings.ts
/**
 * Platform name users put in the "platform" field of config.json.
 */
export const PLATFORM_NAME = 'InimCloud';

/**
 * Must match the "name" in package.json.
 */
export const PLUGIN_NAME = 'homebridge-inim-cloud';
