#!/usr/bin/env node
/**
 * Check a signed URL. Exits non-zero when it is expired or forged.
 *
 * Usage:
 *   npm run verify-url -- "/media/pictures/...?st=...&e=..."
 */
import * as dotenv from 'dotenv';
import { ConfigLoader } from '../lib/config';
import { UrlSigner } from '../services/access/signed-url';
import { errorMessage } from '../utils/logger';

dotenv.config({ path: '.env.local' });
dotenv.config();

async function main() {
  const [url] = process.argv.slice(2);
  if (!url) {
    console.error('Usage: npm run verify-url -- <signedUrl>');
    process.exit(1);
  }

  try {
    const config = await new ConfigLoader().load();
    const valid = new UrlSigner(config.signing).verifyUrl(url);
    console.log(valid ? 'valid' : 'invalid');
    if (!valid) process.exit(2);
  } catch (error) {
    console.error('[verify-url] Failed:', errorMessage(error));
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}

export default main;
