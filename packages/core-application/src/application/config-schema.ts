import { z } from "zod";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const FolderSchema = z
  .object({
    path: z.string().min(1),
    patterns: z.array(z.string().min(1)).optional(),
    // layout of older configuration files
    base_filenames: z.array(z.object({ name: z.string().min(1) })).optional(),
    recursive: z.boolean().default(false),
    downloadCopies: z.boolean().default(true),
  })
  .refine((folder) => (folder.patterns?.length ?? 0) + (folder.base_filenames?.length ?? 0) > 0, {
    message: "folder must track at least one file name or pattern",
  });

export const ConfigFileSchema = z.object({
  versionRoot: z.string().min(1).default("~/.autoversion/versions"),
  debounceMs: z.number().int().positive().default(1500),
  stabilityProbeMs: z.number().int().nonnegative().default(100),
  drainTimeoutMs: z.number().int().nonnegative().default(5000),
  skipUnchanged: z.boolean().default(false),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  folders: z.array(FolderSchema).min(1),
});

export type ConfigFile = z.input<typeof ConfigFileSchema>;
export type ParsedConfigFile = z.output<typeof ConfigFileSchema>;

export const DEFAULT_CONFIG_FILE: ConfigFile = {
  versionRoot: "~/.autoversion/versions",
  debounceMs: 1500,
  folders: [
    {
      path: "~/Downloads",
      patterns: ["statement.pdf", "invoice.pdf", "report.pdf"],
      recursive: false,
      downloadCopies: true,
    },
  ],
};

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}
