/**
 * Configuration & environment validation.
 *
 * Values come from environment variables, validated once at startup and
 * passed down through the git context.
 */

import { homedir } from "node:os";
import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  GITFILE_GIT_COMMAND: z.string().min(1).default("git"),
  // "auto" runs `git --version`; anything else is parsed as the version
  GITFILE_GIT_VERSION: z.string().min(1).default("auto"),
  GITFILE_DOTFILES_ENABLE: booleanFlag.default("false"),
  GITFILE_DOTFILES_COMMAND: z.string().min(1).default("yadm"),
  GITFILE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("warn"),
  GITFILE_BLAME_IGNORE_REVS_FILE: z.string().min(1).default(".git-blame-ignore-revs"),
  HOME: z.string().optional(),
});

export const configSchema = z.object({
  gitCommand: z.string().min(1),
  gitVersion: z.string().min(1),
  dotfiles: z.object({
    enable: z.boolean(),
    command: z.string().min(1),
    home: z.string().min(1),
  }),
  logLevel: z.enum(["debug", "info", "warn", "error"]),
  blameIgnoreRevsFile: z.string().min(1),
});

export type Config = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: Config = {
  gitCommand: "git",
  gitVersion: "auto",
  dotfiles: { enable: false, command: "yadm", home: homedir() },
  logLevel: "warn",
  blameIgnoreRevsFile: ".git-blame-ignore-revs",
};

/**
 * Build a Config from environment variables.
 *
 * @throws ZodError when a variable holds an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.parse(env);
  return configSchema.parse({
    gitCommand: parsed.GITFILE_GIT_COMMAND,
    gitVersion: parsed.GITFILE_GIT_VERSION,
    dotfiles: {
      enable: parsed.GITFILE_DOTFILES_ENABLE,
      command: parsed.GITFILE_DOTFILES_COMMAND,
      home: parsed.HOME || homedir(),
    },
    logLevel: parsed.GITFILE_LOG_LEVEL,
    blameIgnoreRevsFile: parsed.GITFILE_BLAME_IGNORE_REVS_FILE,
  });
}
