/**
 * DealRelay — Telegram Login
 *
 * Signs the user account in once and prints the session string to put
 * into TG_SESSION. Reads TG_API_ID and TG_API_HASH from the environment.
 *
 * Usage:
 *   npm run login
 */

import 'dotenv/config';
import { createInterface } from 'readline/promises';
import { StringSession } from 'telegram/sessions';
import { createTelegramClient } from '../src/platform/mtproto';
import { describeError } from '../src/lib/errors';
import { logger } from '../src/lib/logger';

async function main(): Promise<number> {
  const apiId = Number(process.env.TG_API_ID);
  const apiHash = process.env.TG_API_HASH?.trim();
  if (!Number.isInteger(apiId) || apiId <= 0 || !apiHash) {
    logger.error('TG_API_ID and TG_API_HASH must be set');
    return 1;
  }

  const prompt = createInterface({ input: process.stdin, output: process.stdout });
  const session = new StringSession('');
  const client = createTelegramClient({ apiId, apiHash, session: '' }, session);

  try {
    await client.start({
      phoneNumber: () => prompt.question('Phone number: '),
      phoneCode: () => prompt.question('Login code: '),
      password: () => prompt.question('2FA password (empty if none): '),
      onError: error => {
        logger.error('Login step failed', { error: describeError(error) });
      },
    });

    const me = await client.getMe();
    logger.info('Logged in', { user: me.username ?? me.id.toString() });
    process.stdout.write(`\nTG_SESSION=${session.save()}\n`);
    return 0;
  } catch (error) {
    logger.error('Login failed', { error: describeError(error) });
    return 1;
  } finally {
    prompt.close();
    await client.disconnect();
  }
}

main().then(
  code => process.exit(code),
  error => {
    logger.error('Login crashed', { error: describeError(error) });
    process.exit(1);
  }
);
