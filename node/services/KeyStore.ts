import { promises as fs } from 'fs';
import path from 'path';
import { randomBytes } from 'crypto';
import { ValidationError } from '../../shared/errors';
import { isNotFound } from '../repositories/jsonFile';

export function generateSecretKey(): Uint8Array {
  return new Uint8Array(randomBytes(32));
}

/**
 * Loads the node's 32-byte ed25519 seed from `file` (hex), creating it on
 * first start so the node keeps its id across restarts.
 */
export async function loadOrCreateSecretKey(file: string): Promise<Uint8Array> {
  let saved: string | null = null;
  try {
    saved = (await fs.readFile(file, 'utf8')).trim();
  } catch (err) {
    if (!isNotFound(err)) throw err;
  }

  if (saved !== null) {
    if (!/^[0-9a-f]{64}$/.test(saved)) {
      throw new ValidationError(`secret key file ${file} is corrupt`, 'INVALID_KEY');
    }
    return new Uint8Array(Buffer.from(saved, 'hex'));
  }

  const seed = generateSecretKey();
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, Buffer.from(seed).toString('hex'), { encoding: 'utf8', mode: 0o600 });
  return seed;
}
