export type RunOutcome = 'cleared' | 'timeout' | 'aborted';
