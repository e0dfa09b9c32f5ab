import { z } from 'zod';

const ParamSchema = z.union([
  z.object({
    type: z.string().optional(),
    description: z.string().optional(),
    default: z.unknown().optional(),
    required: z.boolean().optional(),
    minLength: z.number().int().min(0).optional()
  }).passthrough(),
  z.string(),
  z.number(),
  z.boolean(),
  z.null()
]);

const OnErrorSchema = z.object({
  action: z.enum(['fail', 'continue']).optional(),
  retry: z.number().int().min(0).optional(),
  delay: z.number().min(0).optional(),
  next: z.string().min(1).optional(),
  message: z.string().optional()
});

const OutputsSchema = z.union([
  z.string().min(1),
  z.array(z.string().min(1)),
  z.record(z.string().min(1))
]);

// name and task stay optional here: a step without them is a configuration error raised when the
// step is dispatched, not a load failure.
export const StepSchema = z.object({
  name: z.string().min(1).optional(),
  task: z.string().min(1).optional(),
  description: z.string().optional(),
  inputs: z.record(z.unknown()).optional(),
  condition: z.union([z.string(), z.boolean()]).transform(v => String(v)).optional(),
  outputs: OutputsSchema.optional(),
  on_error: OnErrorSchema.optional()
});

export const WorkflowSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  params: z.record(ParamSchema).optional(),
  steps: z.array(StepSchema).min(1, 'workflow must define at least one step'),
  // flows are checked by validateFlows, which reports flow-specific errors
  flows: z.unknown().optional()
});

export type ParsedWorkflow = z.infer<typeof WorkflowSchema>;
