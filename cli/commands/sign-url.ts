#!/usr/bin/env node
/**
 * Print a signed URL for a storage key.
 *
 * Usage:
 *   npm run sign-url -- <storageKey> [--ttl 600]
 */
import * as dotenv from 'dotenv';
import { ConfigLoader } from '../lib/config';
import { UrlSigner } from '../services/access/signed-url';
import { positionals, readNumberFlag } from '../utils/args';
import { errorMessage } from '../utils/logger';

dotenv.config({ path: '.env.local' });
dotenv.config();

async function main() {
  const args = process.argv.slice(2);
  const [storageKey] = positionals(args, ['ttl']);
  if (!storageKey) {
    console.error('Usage: npm run sign-url -- <storageKey> [--ttl 600]');
    process.exit(1);
  }

  try {
    const config = await new ConfigLoader().load();
    const signer = new UrlSigner(config.signing);
    const signed = signer.sign(storageKey, readNumberFlag(args, 'ttl', config.signing.defaultTtlSeconds));
    console.log(signed.url);
    console.log(`Expires: ${new Date(signed.expiresAt * 1000).toISOString()} (${signed.expiresIn}s)`);
  } catch (error) {
    console.error('[sign-url] Failed:', errorMessage(error));
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}

export default main;
