import { RESERVE_FRACTION } from '../config/resources';

export interface AllocationDecision {
    granted: number;
    // Capacity left for this consumer once everyone else's grants are counted
    available: number;
    fulfilled: boolean;
}

/**
 * Decides how much of a request can be granted without eating into the reserve.
 * Admission and rebalancing both go through here so they cap identically.
 */
export function decideAllocation(
    requested: number,
    committedElsewhere: number,
    capacity: number,
    reserveFraction: number = RESERVE_FRACTION
): AllocationDecision {
    const maxAllocatable = capacity * (1 - reserveFraction);
    const available = maxAllocatable - committedElsewhere;
    const granted = Math.min(requested, Math.max(available, 0));

    return {
        granted,
        available,
        fulfilled: granted === requested
    };
}
