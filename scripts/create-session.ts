// pattern: Imperative Shell
import { createInterface } from "node:readline/promises";
import { TelegramClient } from "telegram";
import { StringSession } from "telegram/sessions";
import { z } from "zod";
import { createLogger } from "../src/logger";

/**
 * Logs the reading account in once and prints the session string to put in
 * TELEGRAM_SESSION. Needs TELEGRAM_API_ID and TELEGRAM_API_HASH.
 */
async function main(): Promise<void> {
  const logger = createLogger();
  const env = z
    .object({
      TELEGRAM_API_ID: z.coerce.number().int().positive(),
      TELEGRAM_API_HASH: z.string().min(1),
    })
    .safeParse(process.env);
  if (!env.success) {
    logger.fatal("TELEGRAM_API_ID and TELEGRAM_API_HASH must be set");
    process.exit(1);
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const session = new StringSession("");
  const client = new TelegramClient(
    session,
    env.data.TELEGRAM_API_ID,
    env.data.TELEGRAM_API_HASH,
    { connectionRetries: 5 },
  );

  try {
    await client.start({
      phoneNumber: () => rl.question("Phone number (international format): "),
      password: () => rl.question("Two-step verification password: "),
      phoneCode: () => rl.question("Login code: "),
      onError: (err) => {
        logger.error({ error: err.message }, "login step failed");
      },
    });
    process.stdout.write(`\nTELEGRAM_SESSION=${session.save()}\n\n`);
    logger.info("session created, keep it secret");
  } finally {
    rl.close();
    await client.destroy();
  }
}

main().catch((err) => {
  console.error("session creation failed:", err);
  process.exit(1);
});
