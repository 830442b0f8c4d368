import { z } from "zod";

export const MIN_NARRATIVE_LENGTH = 10;

export const diagnoseRequestSchema = z.object({
  narrative: z
    .string()
    .trim()
    .min(MIN_NARRATIVE_LENGTH, `narrative must be at least ${MIN_NARRATIVE_LENGTH} characters`),
  location: z.string().trim().min(1).max(200).optional(),
  sessionId: z
    .string()
    .trim()
    .regex(/^[\w.-]{1,128}$/, "sessionId may only contain letters, digits, '.', '_' and '-'")
    .optional(),
});

export type DiagnoseRequestBody = z.infer<typeof diagnoseRequestSchema>;

/** First issue per path, `path: message`, joined by "; ". */
export function describeZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
