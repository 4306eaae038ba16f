import { z } from "zod";

const secretsSchema = z.object({
  TELEGRAM_API_ID: z.coerce.number().int().positive(),
  TELEGRAM_API_HASH: z.string().min(1),
  TELEGRAM_SESSION: z.string().min(1),
  TELEGRAM_BOT_TOKEN: z.string().min(1),
});

export type Secrets = Readonly<{
  apiId: number;
  apiHash: string;
  session: string;
  botToken: string;
}>;

/**
 * Reads the transport credentials from the environment. All missing or
 * malformed variables are reported in a single error.
 */
export function loadSecrets(env: NodeJS.ProcessEnv): Secrets {
  const result = secretsSchema.safeParse(env);
  if (!result.success) {
    const names = Array.from(
      new Set(result.error.issues.map((i) => i.path.join("."))),
    );
    throw new Error(
      `missing or invalid environment variables: ${names.join(", ")}`,
    );
  }

  return {
    apiId: result.data.TELEGRAM_API_ID,
    apiHash: result.data.TELEGRAM_API_HASH,
    session: result.data.TELEGRAM_SESSION,
    botToken: result.data.TELEGRAM_BOT_TOKEN,
  };
}
