import { createHash } from 'node:crypto';
import { METRIC_NAME_TAG, type Tags } from '../query-types.js';

const SEP = Buffer.from([0xff]);

function sortedKeys(tags: Tags): string[] {
    return Object.keys(tags).sort();
}

// First 8 bytes of SHA-256, big-endian.
function hashPairs(tags: Tags, keys: string[]): bigint {
    const hasher = createHash('sha256');
    for (const k of keys) {
        hasher.update(k);
        hasher.update(SEP);
        hasher.update(tags[k]);
        hasher.update(SEP);
    }
    return hasher.digest().readBigUInt64BE(0);
}

/**
 * Identity over only the listed keys. Keys absent from `tags` are skipped.
 */
export function idWithKeys(tags: Tags, ...includeKeys: string[]): bigint {
    const include = new Set(includeKeys);
    return hashPairs(tags, sortedKeys(tags).filter((k) => include.has(k)));
}

/**
 * Identity over every key except the listed ones. The metric name is always excluded.
 */
export function idWithExcludes(tags: Tags, ...excludeKeys: string[]): bigint {
    const exclude = new Set(excludeKeys);
    exclude.add(METRIC_NAME_TAG);
    return hashPairs(tags, sortedKeys(tags).filter((k) => !exclude.has(k)));
}

