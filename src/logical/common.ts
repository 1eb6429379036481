import type { Tags } from '../query-types.js';
import { idWithExcludes, idWithKeys } from '../models/tags.js';

export type IdFunction = (tags: Tags) => bigint;

/**
 * Signature function for a matching rule: `on` hashes only `names`,
 * otherwise (`ignoring`) hashes everything but `names` and the metric name.
 */
export function hashFunc(on: boolean, ...names: string[]): IdFunction {
    if (on) {
        return (tags) => idWithKeys(tags, ...names);
    }
    return (tags) => idWithExcludes(tags, ...names);
}
