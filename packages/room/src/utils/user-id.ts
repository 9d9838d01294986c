import type { UserID } from '../types/_common';

/**
 * Server name part of a Matrix identifier (`@localpart:server.name[:port]`).
 * Returns undefined when the identifier carries no domain.
 */
export function extractDomainFromId(identifier: string): string | undefined {
	const idx = identifier.indexOf(':');
	if (idx === -1 || idx === identifier.length - 1) {
		return undefined;
	}
	return identifier.substring(idx + 1);
}

export function isUserFromServer(userId: UserID, serverName: string) {
	return extractDomainFromId(userId) === serverName;
}
