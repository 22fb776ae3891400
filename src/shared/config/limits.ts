/** Longest delay Node timers honour; a larger one fires after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
