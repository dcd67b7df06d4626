import { z } from "zod";

const Scalar = z.union([z.string(), z.number(), z.boolean()]);

const StringMap = z.record(Scalar.transform(String)).default({});

const StringList = z
	.union([z.string(), z.array(z.string())])
	.transform((value) => (Array.isArray(value) ? value : [value]));

const Condition = z.union([z.string(), z.boolean()]).transform(String);

export const TriggerFilterSchema = z.object({
	branches: StringList.optional(),
	"branches-ignore": StringList.optional(),
	tags: StringList.optional(),
	"tags-ignore": StringList.optional(),
	paths: StringList.optional(),
	"paths-ignore": StringList.optional(),
	types: StringList.optional(),
});

export const StepSchema = z
	.object({
		name: z.string().optional(),
		id: z.string().optional(),
		run: z.string().optional(),
		uses: z.string().optional(),
		with: StringMap,
		if: Condition.optional(),
		env: StringMap,
		shell: z.string().optional(),
		"working-directory": z.string().optional(),
		"continue-on-error": z.boolean().default(false),
		"timeout-minutes": z.number().positive().optional(),
	})
	.refine((step) => step.run !== undefined || step.uses !== undefined, {
		message: "A step needs either `run` or `uses`",
	});

export const MatrixSchema = z
	.object({
		include: z.array(z.record(Scalar)).default([]),
		exclude: z.array(z.record(Scalar)).default([]),
	})
	.catchall(z.array(Scalar));

export const StrategySchema = z.object({
	"fail-fast": z.boolean().default(true),
	"max-parallel": z.number().int().positive().optional(),
	matrix: MatrixSchema,
});

export const JobSchema = z.object({
	name: z.string().optional(),
	needs: StringList.default([]),
	if: Condition.optional(),
	"runs-on": StringList.optional(),
	env: StringMap,
	"timeout-minutes": z.number().positive().optional(),
	"allow-skipped-needs": z.boolean().default(false),
	strategy: StrategySchema.optional(),
	produces: z.record(z.string()).default({}),
	consumes: z
		.array(z.union([z.string(), z.object({ name: z.string(), path: z.string().optional() })]))
		.default([]),
	steps: z.array(StepSchema).default([]),
});

export const PipelineSchema = z.object({
	name: z.string().optional(),
	on: z
		.union([z.string(), z.array(z.string()), z.record(TriggerFilterSchema.nullable())])
		.optional(),
	env: StringMap,
	concurrency: z
		.union([
			z.string(),
			z.object({
				group: z.string(),
				"cancel-in-progress": z.boolean().default(false),
			}),
		])
		.optional(),
	required: z
		.array(
			z.union([
				z.string(),
				z.object({
					job: z.string(),
					"allow-skipped": z.boolean().default(false),
				}),
			]),
		)
		.default([]),
	defaults: z
		.object({
			"timeout-minutes": z.number().positive().optional(),
		})
		.optional(),
	jobs: z.record(JobSchema),
});

export type PipelineDocument = z.infer<typeof PipelineSchema>;
export type JobDocument = z.infer<typeof JobSchema>;
export type StepDocument = z.infer<typeof StepSchema>;
export type TriggerFilterDocument = z.infer<typeof TriggerFilterSchema>;
