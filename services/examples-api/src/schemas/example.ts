import { z } from 'zod';
import type { ExamplePatch, ExampleRecord, NewExample } from '../types';

export const NAME_MAX_LENGTH = 255;

const nameSchema = z
  .string({ required_error: 'name is required', invalid_type_error: 'name must be a string' })
  .refine((value) => value.trim().length > 0, 'name must not be blank')
  // counted in code points, so astral characters count once
  .refine((value) => [...value].length <= NAME_MAX_LENGTH, `name must be at most ${NAME_MAX_LENGTH} characters`);

const descriptionSchema = z.string({ invalid_type_error: 'description must be a string' });
const isActiveSchema = z.boolean({ invalid_type_error: 'is_active must be a boolean' });

// ---------- Requests ----------
export const exampleCreateSchema = z.object(
  {
    name: nameSchema,
    description: descriptionSchema.nullish().transform((value) => value ?? ''),
    is_active: isActiveSchema.default(true),
  },
  { required_error: 'request body is required', invalid_type_error: 'request body must be an object' },
);

// null and absent both leave the stored value untouched
export const exampleUpdateSchema = z.object(
  {
    name: nameSchema.nullish(),
    description: descriptionSchema.nullish(),
    is_active: isActiveSchema.nullish(),
  },
  { required_error: 'request body is required', invalid_type_error: 'request body must be an object' },
);

// ---------- Responses ----------
export const exampleResponseSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  is_active: z.boolean(),
  created_at: z.string().datetime(),
  updated_at: z.string().datetime(),
});

export const exampleListResponseSchema = z.object({
  count: z.number().int().nonnegative(),
  next: z.string().url().nullable(),
  previous: z.string().url().nullable(),
  results: z.array(exampleResponseSchema),
});

export type ExampleResponse = z.infer<typeof exampleResponseSchema>;
export type ExampleListResponse = z.infer<typeof exampleListResponseSchema>;

// ---------- Validation ----------
export type FieldError = {
  field: string;
  message: string;
};

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: FieldError[] };

export function toFieldErrors(error: z.ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'body',
    message: issue.message,
  }));
}

export function validateCreate(payload: unknown): ValidationResult<NewExample> {
  const parsed = exampleCreateSchema.safeParse(payload);
  if (!parsed.success) return { ok: false, errors: toFieldErrors(parsed.error) };
  return { ok: true, value: parsed.data };
}

export function validateUpdate(payload: unknown): ValidationResult<ExamplePatch> {
  const parsed = exampleUpdateSchema.safeParse(payload);
  if (!parsed.success) return { ok: false, errors: toFieldErrors(parsed.error) };

  const { name, description, is_active } = parsed.data;
  const patch: ExamplePatch = {};
  if (name != null) patch.name = name;
  if (description != null) patch.description = description;
  if (is_active != null) patch.is_active = is_active;
  return { ok: true, value: patch };
}

export function serializeExample(record: ExampleRecord): ExampleResponse {
  return exampleResponseSchema.parse({
    id: record.id,
    name: record.name,
    description: record.description,
    is_active: record.is_active,
    created_at: record.created_at.toISOString(),
    updated_at: record.updated_at.toISOString(),
  });
}
