/**
 * Command-line and environment options, validated with zod.
 */

import { z } from "zod";
import { findFormat } from "../parsers/index.js";

/** Set to 1 (or true) to never launch a browser. */
export const NO_OPEN_ENV = "WAFER_REPORT_NO_OPEN";

const blockIndexSchema = z.coerce
  .number({ invalid_type_error: "--block expects a number" })
  .int("--block expects a whole number")
  .nonnegative("--block expects a non-negative index");

const mdmPathSchema = z
  .string({ required_error: "an MDM file path is required" })
  .min(1, "an MDM file path is required");

export const CliOptionsSchema = z
  .discriminatedUnion("command", [
    z.object({ command: z.literal("version") }),
    z.object({ command: z.literal("help") }),
    z.object({
      command: z.literal("report"),
      csvPath: z.string().min(1),
      autoOpen: z.boolean(),
    }),
    z.object({
      command: z.literal("mdm"),
      mdmPath: mdmPathSchema,
      outputPath: z.string().min(1).optional(),
      autoOpen: z.boolean(),
    }),
    z.object({
      command: z.literal("json"),
      mdmPath: mdmPathSchema,
      blockIndex: blockIndexSchema.optional(),
    }),
  ]);

export type CliOptions = z.infer<typeof CliOptionsSchema>;

const EnvSchema = z.object({
  [NO_OPEN_ENV]: z
    .string()
    .optional()
    .transform((value) => value === "1" || value?.toLowerCase() === "true"),
});

const VALUE_FLAGS = ["--mdm", "--out", "--block"] as const;

const flagValue = (args: readonly string[], flag: string): string | undefined => {
  const i = args.indexOf(flag);
  if (i === -1) return undefined;
  const value = args[i + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new Error(`${flag} expects a value`);
  }
  return value;
};

/**
 * Arguments that are neither flags nor a flag's value.
 */
const positionals = (args: readonly string[]): string[] =>
  args.filter(
    (arg, i) =>
      !arg.startsWith("-") &&
      !VALUE_FLAGS.some((flag) => flag === args[i - 1]),
  );

/**
 * Turn argv (without the node and script entries) and the environment into
 * validated options. Throws on invalid input.
 */
export const parseCliOptions = (
  args: readonly string[],
  env: Record<string, string | undefined> = process.env,
): CliOptions => {
  if (args.includes("--version") || args.includes("-v")) {
    return { command: "version" };
  }
  if (args.includes("--help") || args.includes("-h")) {
    return { command: "help" };
  }

  const noOpen = args.includes("--no-open") || EnvSchema.parse(env)[NO_OPEN_ENV];
  const [first] = positionals(args);
  const mdmPath =
    flagValue(args, "--mdm") ??
    (first !== undefined && findFormat(first) === "mdm" ? first : undefined);

  let raw: unknown;
  if (args.includes("--json")) {
    raw = {
      command: "json",
      mdmPath: mdmPath ?? first,
      blockIndex: flagValue(args, "--block"),
    };
  } else if (mdmPath !== undefined) {
    raw = {
      command: "mdm",
      mdmPath,
      outputPath: flagValue(args, "--out"),
      autoOpen: !noOpen,
    };
  } else if (first !== undefined) {
    raw = { command: "report", csvPath: first, autoOpen: !noOpen };
  } else {
    return { command: "help" };
  }

  const result = CliOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(result.error.issues.map((issue) => issue.message).join("; "));
  }
  return result.data;
};
