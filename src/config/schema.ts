import { z } from "zod";

const channelConfigSchema = z.object({
  id: z
    .union([z.string().min(1), z.number().int()])
    .transform((id) => String(id)),
  name: z.string().min(1),
});

const scheduleTimeSchema = z
  .string()
  .regex(/^([01]?\d|2[0-3]):[0-5]\d$/, "expected HH:MM in 24h format");

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

export const appConfigSchema = z.object({
  llm: z.object({
    provider: z.enum(["anthropic", "openai", "gemini", "ollama", "lmstudio"]),
    model: z.string().min(1),
    baseUrl: z.string().url().optional(),
    temperature: z.number().min(0).max(2).default(0.7),
    maxOutputTokens: z.number().int().positive().default(1000),
    timeoutSeconds: z.number().int().positive().default(30),
  }),
  channels: z
    .array(channelConfigSchema)
    .min(1)
    .refine(
      (channels) => new Set(channels.map((c) => c.name)).size === channels.length,
      "channel names must be unique",
    ),
  schedule: z.object({
    time: scheduleTimeSchema.default("08:00"),
    timezone: z
      .string()
      .min(1)
      .refine(isValidTimeZone, "unknown IANA time zone")
      .default("UTC"),
  }),
  digest: z.object({
    recipientId: z.number().int().positive(),
    lookbackHours: z.number().int().positive().default(24),
    maxMessagesPerChannel: z.number().int().positive().default(500),
    outputLanguage: z.string().min(1).default("English"),
    locale: z.string().min(1).default("en-GB"),
    useIcons: z.boolean().default(true),
    includeStatistics: z.boolean().default(true),
    autoCleanup: z.boolean().default(true),
    mode: z.enum(["per_channel", "combined"]).default("per_channel"),
  }),
  delivery: z
    .object({
      maxMessageLength: z.number().int().min(2).max(4096).default(4000),
      pacingMs: z.number().int().nonnegative().default(500),
    })
    .prefault({}),
  storage: z
    .object({
      path: z.string().min(1).default("./data/digest-messages.json"),
    })
    .prefault({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type ChannelConfig = AppConfig["channels"][number];
