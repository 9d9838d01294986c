import type { DenyReason, Decision, FollowUpEvent } from '../types';

export const allow = (): Decision => ({ kind: 'allow' });

export const deny = (reason: DenyReason): Decision => ({
	kind: 'deny',
	reason,
});

export const allowWithFollowUp = (events: FollowUpEvent[]): Decision => ({
	kind: 'allow-with-follow-up',
	events,
});
