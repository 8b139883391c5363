import { z } from 'zod';

/**
 * Zod schemas for kitchen dispatch requests and persisted queue payloads
 */

export const PrinterSnapshotSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  host: z.string(),
  port: z.number().int(),
  connection: z.enum(['network', 'relay']),
});

export const TicketItemSchema = z.object({
  itemId: z.string().min(1),
  name: z.string(),
  quantity: z.number().int(),
  variant: z.string().nullable(),
  modifiers: z.array(z.string()),
  specialInstructions: z.string().nullable(),
  notes: z.string().nullable(),
});

// Dates are stored as ISO strings inside the queue payload column
export const DispatchJobSchema = z.object({
  id: z.string().min(1),
  orderId: z.string().min(1),
  orderNumber: z.string(),
  printer: PrinterSnapshotSchema,
  items: z.array(TicketItemSchema),
  content: z.string(),
  priority: z.number().int(),
  attempt: z.number().int().nonnegative(),
  createdAt: z.coerce.date(),
});

export const DispatchRequestSchema = z.object({
  actorId: z.string().min(1, 'actorId is required'),
  actorName: z.string().min(1, 'actorName is required'),
});

export const AutoAssignRequestSchema = z.object({
  categories: z
    .array(
      z.object({
        id: z.string().min(1, 'Category id is required'),
        name: z.string().min(1, 'Category name is required'),
      }),
    )
    .min(1, 'At least one category is required'),
});

export const ResolveQuerySchema = z.object({
  menuItemId: z.string().min(1, 'menuItemId is required'),
  categoryId: z.string().optional(),
});


/**
 * Flattens zod issues into one readable line for `{ error }` responses.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
