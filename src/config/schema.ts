import { z } from "zod";

export const configSchema = z.object({
	apiBase: z.string().url(),
	apiKey: z.string().min(1).optional(),
	timeoutMs: z.number().int().positive().optional(),
	parallel: z.boolean().optional(),
	visionImageUrl: z.string().min(1).optional(),
});

export type Config = z.infer<typeof configSchema>;

export interface ConfigValidationError {
	field: string;
	message: string;
}

export function validateConfig(config: unknown): ConfigValidationError[] {
	const result = configSchema.safeParse(config);
	if (result.success) return [];

	return result.error.issues.map((issue) => ({
		field: issue.path.length > 0 ? issue.path.join(".") : "root",
		message: issue.message,
	}));
}
