import { z } from 'zod';

export async function parseJson<T extends z.ZodTypeAny>(
  req: Request,
  schema: T,
): Promise<
  | { success: true; data: z.infer<T> }
  | { success: false; error: string; details?: unknown }
> {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return {
      success: false,
      error: 'Invalid JSON payload',
    };
  }
  const result = schema.safeParse(body);
  if (!result.success) {
    return {
      success: false,
      error: 'Invalid request body',
      details: result.error.flatten(),
    };
  }
  return { success: true, data: result.data };
}
