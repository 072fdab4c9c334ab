// Topics are derived from the device's display name and are case-sensitive.
const TOPIC_PREFIX = 'hass.agent/media_player';

export const stateTopic = (deviceName: string): string => `${TOPIC_PREFIX}/${deviceName}/state`;

export const thumbnailTopic = (deviceName: string): string => `${TOPIC_PREFIX}/${deviceName}/thumbnail`;

export const commandTopic = (deviceName: string): string => `${TOPIC_PREFIX}/${deviceName}/cmd`;
