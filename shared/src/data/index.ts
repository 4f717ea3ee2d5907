import usStates from './us-states.json' with { type: 'json' };

/**
 * Postal codes of the 50 US states. Default geo IDs for nationwide searches.
 */
export const US_STATES: readonly string[] = Object.freeze([...usStates]);
