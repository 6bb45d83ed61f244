import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./seqbundle-errors";

export const PASSWORD_ENV = "APIUSER_PW";

const optionsSchema = z.object({
  stepUri: z.string().url(),
  username: z.string().min(1).default("apiuser"),
  password: z.string().optional(),
  baseUri: z.string().url().optional(),
  archive: z.string().min(1).optional(),
  logFile: z.string().min(1).optional(),
  concurrency: z.coerce.number().int().min(1).max(32).default(4),
  timeout: z.coerce.number().int().min(1).default(30000),
  sendEmails: z.boolean().default(false),
  smtpHost: z.string().min(1).default("localhost"),
  smtpPort: z.coerce.number().int().min(1).max(65535).default(25),
  emailFrom: z.string().min(1).default("noreply@localhost"),
});

export type SeqbundleConfig = {
  stepUri: string;
  username: string;
  password: string;
  // scheme and host only - the API itself is at <baseUri>/api/v2
  baseUri: string;
  // an S3 URI or an absolute path - when absent the archives attached to the step are used
  archive?: string;
  logFile?: string;
  concurrency: number;
  timeoutMs: number;
  sendEmails: boolean;
  smtpHost: string;
  smtpPort: number;
  emailFrom: string;
};

/**
 * A base URI is accepted with or without the "/api/v2" suffix.
 */
export function normaliseBaseUri(uri: string): string {
  return uri.replace(/\/+$/, "").replace(/\/api\/v2$/, "");
}

/**
 * Build the configuration of a run from the command line options, with
 * the password falling back to the environment and the base URI to the
 * origin of the step URI.
 *
 * @param options as parsed by commander
 * @param env
 */
export function loadConfig(
  options: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): SeqbundleConfig {
  const parsed = optionsSchema.safeParse(options);

  if (!parsed.success)
    throw new ConfigError(
      "Invalid options",
      parsed.error.issues.map((i) => ({
        message: `${i.path.join(".")}: ${i.message}`,
      })),
    );

  const o = parsed.data;

  const password = o.password ?? env[PASSWORD_ENV];

  if (!password)
    throw new ConfigError(
      `A password is required (use --password or set ${PASSWORD_ENV})`,
      [{ message: "No password given" }],
    );

  let archive = o.archive;

  // relative paths are made absolute so the run does not depend on where it was started from
  if (archive && !archive.startsWith("s3://")) archive = resolve(archive);

  return {
    stepUri: o.stepUri,
    username: o.username,
    password,
    baseUri: normaliseBaseUri(o.baseUri ?? new URL(o.stepUri).origin),
    archive,
    logFile: o.logFile,
    concurrency: o.concurrency,
    timeoutMs: o.timeout,
    sendEmails: o.sendEmails,
    smtpHost: o.smtpHost,
    smtpPort: o.smtpPort,
    emailFrom: o.emailFrom,
  };
}
