import { z } from 'zod';

export const workflowStatusSchema = z.enum(['active', 'completed', 'archived', 'pending']);
export const taskStatusSchema = z.enum(['pending', 'in_progress', 'completed']);

const idSchema = z.string().trim().min(1);

export const taskDefinitionSchema = z.object({
  name: z.string().trim().min(1),
  order: z.number().int().nonnegative(),
  dueDatetimeOffsetMinutes: z.number().int().nullable().default(0)
});

export const workflowDefinitionSchema = z.object({
  id: idSchema,
  name: z.string().trim().min(1),
  description: z.string().default(''),
  taskDefinitions: z.array(taskDefinitionSchema).default([]),
  dueDatetime: z.date().nullable().default(null)
});

export const taskInstanceSchema = z.object({
  id: idSchema,
  workflowInstanceId: idSchema,
  name: z.string(),
  order: z.number().int(),
  status: taskStatusSchema.default('pending'),
  dueDatetime: z.date().nullable().default(null)
});

export const workflowInstanceSchema = z.object({
  id: idSchema,
  workflowDefinitionId: idSchema,
  name: z.string(),
  userId: idSchema,
  status: workflowStatusSchema.default('active'),
  createdAt: z.date(),
  dueDatetime: z.date().nullable().default(null),
  tasks: z.array(taskInstanceSchema).default([])
});

const optionalDateSchema = z
  .string()
  .trim()
  .optional()
  .transform((value, ctx): Date | null => {
    if (!value) {
      return null;
    }
    const parsed = new Date(value);
    if (Number.isNaN(parsed.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid date' });
      return z.NEVER;
    }
    return parsed;
  });

export const newWorkflowDefinitionInputSchema = z.object({
  name: z.string(),
  description: z.string().default(''),
  taskDefinitions: z.array(taskDefinitionSchema).default([]),
  dueDatetime: z.date().nullable().default(null)
});

export const saveWorkflowDefinitionInputSchema = z.object({
  id: z.string().trim().optional(),
  name: z.string().default(''),
  description: z.string().default(''),
  taskDefinitions: z.string().default('')
});

export const newTaskDefinitionInputSchema = z.object({
  name: z.string().trim().min(1),
  dueDatetimeOffsetMinutes: z.coerce.number().int().nullable().default(0)
});

export const newWorkflowInstanceInputSchema = z.object({
  name: z.string().trim().optional(),
  dueDatetime: optionalDateSchema
});

export const workflowInstanceFilterSchema = z.object({
  status: z
    .union([workflowStatusSchema, z.literal('')])
    .optional()
    .transform((value) => (value ? value : undefined)),
  definitionId: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined))
});

export type WorkflowStatus = z.infer<typeof workflowStatusSchema>;
export type TaskStatus = z.infer<typeof taskStatusSchema>;
export type TaskDefinition = z.infer<typeof taskDefinitionSchema>;
export type WorkflowDefinition = z.infer<typeof workflowDefinitionSchema>;
export type TaskInstance = z.infer<typeof taskInstanceSchema>;
export type WorkflowInstance = z.infer<typeof workflowInstanceSchema>;
export type NewWorkflowDefinitionInput = z.input<typeof newWorkflowDefinitionInputSchema>;
export type SaveWorkflowDefinitionInput = z.input<typeof saveWorkflowDefinitionInputSchema>;
export type NewTaskDefinitionInput = z.input<typeof newTaskDefinitionInputSchema>;
export type NewWorkflowInstanceInput = z.input<typeof newWorkflowInstanceInputSchema>;
export type WorkflowInstanceFilter = z.output<typeof workflowInstanceFilterSchema>;
