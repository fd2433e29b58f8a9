import { z } from 'zod';
import { PRIORITIES, TASK_STATUSES } from '../model.js';
import { isCalendarDate } from '../dates.js';

export const MAX_TAGS = 20;
export const TITLE_REQUIRED = 'Task title is required';

/** Trim, lower-case, drop empties, de-duplicate (first occurrence wins). */
export function normalizeTags(tags: readonly string[]): string[] {
  const out: string[] = [];
  for (const raw of tags) {
    const tag = raw.trim().toLowerCase();
    if (tag && !out.includes(tag)) out.push(tag);
  }
  return out;
}

const TitleSchema = z
  .string({ required_error: TITLE_REQUIRED, invalid_type_error: TITLE_REQUIRED })
  .trim()
  .min(1, TITLE_REQUIRED)
  .max(200, 'Task title must be at most 200 characters');

const DescriptionSchema = z
  .string({ invalid_type_error: 'Description must be a string' })
  .trim()
  .max(2000, 'Description must be at most 2000 characters')
  .nullish()
  .transform((v) => v ?? '');

const PrioritySchema = z.enum(PRIORITIES, {
  errorMap: () => ({ message: `Priority must be one of: ${PRIORITIES.join(', ')}` }),
});

const StatusSchema = z.enum(TASK_STATUSES, {
  errorMap: () => ({ message: `Status must be one of: ${TASK_STATUSES.join(', ')}` }),
});

/** Accepts an array or a comma-separated string (what HTML forms send). */
const TagsSchema = z
  .union([z.array(z.string()), z.string()], {
    errorMap: () => ({ message: 'Tags must be a list of strings' }),
  })
  .nullish()
  .transform((v, ctx) => {
    const list = v == null ? [] : typeof v === 'string' ? v.split(',') : v;
    const tags = normalizeTags(list);
    if (tags.length > MAX_TAGS) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `A task can have at most ${MAX_TAGS} tags` });
      return z.NEVER;
    }
    return tags;
  });

/** `null` or "" clears the date. */
const DueDateSchema = z
  .union([
    z.literal(''),
    z.null(),
    z.string().refine(isCalendarDate, { message: 'Due date must be a valid date in YYYY-MM-DD format' }),
  ])
  .transform((v) => (v ? v : null));

export const CreateTaskSchema = z.object({
  title: TitleSchema,
  description: DescriptionSchema,
  priority: PrioritySchema.default('medium'),
  status: StatusSchema.optional(),
  completed: z.boolean().optional(),
  tags: TagsSchema,
  due_date: DueDateSchema.optional(),
});

export type CreateTaskInput = z.input<typeof CreateTaskSchema>;

/** Partial update. Keys not listed here are ignored. */
export const UpdateTaskSchema = z.object({
  title: TitleSchema.optional(),
  description: DescriptionSchema.optional(),
  priority: PrioritySchema.optional(),
  status: StatusSchema.optional(),
  completed: z.boolean({ invalid_type_error: 'Completed must be true or false' }).optional(),
  tags: TagsSchema.optional(),
  due_date: DueDateSchema.optional(),
});

export type UpdateTaskInput = z.input<typeof UpdateTaskSchema>;

/** Due-date buckets the task list can be filtered by. */
export const DUE_FILTERS = ['overdue', 'today', 'soon'] as const;

export const TaskFilterSchema = z.object({
  status: StatusSchema.optional(),
  due: z
    .enum(DUE_FILTERS, { errorMap: () => ({ message: `Due filter must be one of: ${DUE_FILTERS.join(', ')}` }) })
    .optional(),
  priority: PrioritySchema.optional(),
  tag: z
    .string()
    .trim()
    .toLowerCase()
    .min(1)
    .optional(),
});

export type TaskFilter = z.infer<typeof TaskFilterSchema>;
