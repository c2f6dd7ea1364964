import { Outcome, Policy } from '@portcheck/core';

export const EXIT_PASS = 0;
export const EXIT_FAIL = 1;
export const EXIT_CONFIG_ERROR = 2;
export const EXIT_INTERNAL_ERROR = 3;

export type RunEnd =
    | { kind: 'outcome'; outcome: Outcome }
    | { kind: 'config-error' }
    | { kind: 'internal-error' };

/**
 * Maps how a run ended to the process exit code.
 * Advisory runs always succeed; gating runs succeed only on a passing outcome.
 */
export function exitCodeFor(policy: Policy, end: RunEnd): number {
    if (policy === 'advisory') {
        return EXIT_PASS;
    }
    switch (end.kind) {
        case 'outcome':
            return end.outcome.pass ? EXIT_PASS : EXIT_FAIL;
        case 'config-error':
            return EXIT_CONFIG_ERROR;
        case 'internal-error':
            return EXIT_INTERNAL_ERROR;
    }
}
