import { z, type ZodIssue } from "zod";

export const DEFAULT_MAX_UPLOAD_BYTES = 16 * 1024 * 1024;

export const ConnectionReferencePolicySchema = z.enum(["permissive", "strict"]);

export type ConnectionReferencePolicy = z.infer<typeof ConnectionReferencePolicySchema>;

export const ServerConfigSchema = z
  .object({
    host: z.string().min(1).default("127.0.0.1"),
    port: z.number().int().nonnegative().max(65_535).default(5000),
    storage_dir: z.string().min(1).default("uploads"),
    max_upload_bytes: z.number().int().positive().default(DEFAULT_MAX_UPLOAD_BYTES),
    allowed_extensions: z.array(z.string().min(2).startsWith(".")).min(1).default([".pdsprj"]),
    connection_references: ConnectionReferencePolicySchema.default("permissive"),
    max_sessions: z.number().int().positive().default(32),
    open_browser: z.boolean().default(false),
    log_file: z.string().min(1).optional(),
  })
  .strict();

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export function formatSchemaIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "invalid_enum_value") {
      const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
      return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}
