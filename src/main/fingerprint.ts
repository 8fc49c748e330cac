import crypto from 'crypto';
import fs from 'fs';
import type { ContentFingerprint, FingerprintStrategy } from '../types/organizer';

export const DEFAULT_HASH_ALGORITHM = 'sha256';

export const isSupportedHashAlgorithm = (algorithm: string) =>
  crypto.getHashes().includes(algorithm.toLowerCase());

const hashFile = (filePath: string, algorithm: string) =>
  new Promise<string>((resolve, reject) => {
    const digest = crypto.createHash(algorithm);
    const stream = fs.createReadStream(filePath);

    stream.on('error', (error) => reject(error));
    stream.on('data', (chunk) => digest.update(chunk));
    stream.on('end', () => resolve(digest.digest('hex')));
  });

export const createHashFingerprintStrategy = (
  algorithm: string = DEFAULT_HASH_ALGORITHM,
): FingerprintStrategy => {
  const normalised = algorithm.toLowerCase();
  if (!isSupportedHashAlgorithm(normalised)) {
    throw new Error(`Unsupported hash algorithm "${algorithm}"`);
  }
  return {
    algorithm: normalised,
    fingerprint: async (filePath): Promise<ContentFingerprint> => ({
      algorithm: normalised,
      digest: await hashFile(filePath, normalised),
    }),
  };
};
