export * from './types/_common';
export * from './types/events';
export * from './state/definitions';
export { PowerLevelEvent } from './manager/power-level-event-wrapper';
export { RoomState, type MembershipEntry } from './manager/room-state';
export { extractDomainFromId, isUserFromServer } from './utils/user-id';
