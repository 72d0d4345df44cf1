import * as z from "zod";

const flag = z
  .string()
  .optional()
  .transform((value) => value !== undefined && ["1", "true", "yes", "on"].includes(value.trim().toLowerCase()));

const ConfigSchema = z.object({
  MONGODB_URI: z.string().min(1).default("mongodb://127.0.0.1:27017/release-notes"),
  DEV: flag,
  RNA_BASE_URL: z.string().url("RNA_BASE_URL must be an absolute URL.").optional(),
  RNA_TOKEN: z.string().min(1).optional(),
  STAGING_SITE_URL: z.string().url().default("https://www-dev.allizom.org/en-US"),
  PUBLIC_SITE_URL: z.string().url().default("https://www.mozilla.com/en-US"),
});

export interface AppConfig {
  mongodbUri: string;
  developmentMode: boolean;
  sync: { baseUrl?: string; token?: string };
  site: { stagingUrl: string; publicUrl: string };
}

/**
 * Reads configuration from the environment. Throws with the offending
 * variable names when a value is malformed.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration. ${details}`);
  }

  const { data } = parsed;
  return {
    mongodbUri: data.MONGODB_URI,
    developmentMode: data.DEV,
    sync: { baseUrl: data.RNA_BASE_URL, token: data.RNA_TOKEN },
    site: { stagingUrl: data.STAGING_SITE_URL, publicUrl: data.PUBLIC_SITE_URL },
  };
}
