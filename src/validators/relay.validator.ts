import { z } from 'zod';

/**
 * Wire shapes returned by the cloud print relay
 */

export const RelayRegistrationResponseSchema = z.object({
  sessionId: z.string().min(1),
});

export const RelayPrinterStatusSchema = z.object({
  isOnline: z.boolean(),
  lastActivity: z.string().optional(),
});

export const RelayConfirmationSchema = z.object({
  jobId: z.string().optional(),
  orderId: z.string(),
  printerId: z.string(),
  success: z.boolean().default(false),
});

export const RelayFailureSchema = z.object({
  jobId: z.string().optional(),
  orderId: z.string(),
  printerId: z.string(),
  error: z.string().optional(),
});

export const RelayStatusUpdateSchema = z.object({
  printerStatus: z.record(RelayPrinterStatusSchema).optional(),
  orderConfirmations: z.array(RelayConfirmationSchema).optional(),
  failedOrders: z.array(RelayFailureSchema).optional(),
});

export const RelayQueuedJobSchema = z.object({
  id: z.string().min(1),
  orderId: z.string(),
  orderNumber: z.string().optional(),
  content: z.string(),
});

export const RelayQueuedJobsSchema = z.object({
  jobs: z.array(RelayQueuedJobSchema).default([]),
});

export type RelayStatusUpdate = z.infer<typeof RelayStatusUpdateSchema>;
export type RelayConfirmation = z.infer<typeof RelayConfirmationSchema>;
export type RelayFailure = z.infer<typeof RelayFailureSchema>;
export type RelayQueuedJob = z.infer<typeof RelayQueuedJobSchema>;
