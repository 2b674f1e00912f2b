import { z } from "zod";

export const convertRequestSchema = z.object({
  artifactId: z.string().min(1),
});

export const mergeRequestSchema = z.object({
  artifactIds: z.array(z.string().min(1)),
  outputName: z.string(),
});

export type ConvertRequest = z.infer<typeof convertRequestSchema>;
export type MergeRequest = z.infer<typeof mergeRequestSchema>;
