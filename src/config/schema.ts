import { z } from "zod";

export const ArtifactsSchema = z.object({
	transport: z.enum(["memory", "filesystem"]).default("memory"),
});

export const NotifySchema = z.object({
	/** Shell command that receives the final result as JSON on stdin. */
	command: z.string().optional(),
});

export const ConfigSchema = z.object({
	executor: z.string().default("shell"),
	shell: z.string().default("sh"),
	maxWorkers: z.number().int().positive().default(4),
	defaultTimeoutMinutes: z.number().positive().default(360),
	pipelinesDir: z.string().default(".github/workflows"),
	artifacts: ArtifactsSchema.default({ transport: "memory" }),
	notify: NotifySchema.default({}),
	env: z.record(z.string()).default({}),
	vars: z.record(z.string()).default({}),
	/** Values for `secrets.*`; unset secrets read as empty strings. */
	secrets: z.record(z.string()).default({}),
});

export type PipewrightConfig = z.infer<typeof ConfigSchema>;
