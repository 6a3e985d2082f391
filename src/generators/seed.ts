import { randomBytes } from 'node:crypto';

/**
 * Source of non-reproducible 32-bit seeds for generators constructed without one.
 */
export type SeedSource = () => number;

export const systemSeedSource: SeedSource = () => randomBytes(4).readUInt32LE(0);
