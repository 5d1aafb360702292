import { z } from 'zod';

// --- HTTP Route Schemas ---

// Configuration
export const ConfigurationParams = z.object({
  contextType: z.string().min(1),
  contextId: z
    .string()
    .regex(/^\d+$/, 'contextId must be a non-negative integer')
    .transform(Number)
    .pipe(z.number().safe('contextId is out of range')),
});

// Plugin administration
export const PluginNameParams = z.object({
  name: z.string().min(1),
});
export const SetPluginEnabledBody = z.object({
  enabled: z.boolean(),
});

// Raw config administration
export const ConfigNamespaceParams = z.object({
  namespace: z.string().regex(/^[a-z][a-z0-9_]*$/, 'namespace must be lowercase with underscores'),
});
export const ConfigKeyParams = ConfigNamespaceParams.extend({
  key: z.string().regex(/^[A-Za-z0-9_.]+$/, 'key may contain letters, digits, "_" and "."'),
});
export const SetConfigValueBody = z.object({
  value: z.string(),
});

// Caller identity
export const UserIdHeader = z.string().regex(/^[1-9]\d*$/, 'user id must be a positive integer').transform(Number);

// --- Validation helper ---

export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
): { success: true; data: T } | { success: false; error: string } {
  const result = schema.safeParse(data);
  if (!result.success) return { success: false, error: result.error.issues.map((i) => i.message).join(', ') };
  return { success: true, data: result.data };
}
