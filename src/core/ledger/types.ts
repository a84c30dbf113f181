import { z } from 'zod';

export const TimestampIso = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'timestamp must be ISO datetime' });

export const LedgerEventType = z.enum(['run_started', 'gate_finished', 'run_completed', 'bypass_recorded']);
export type LedgerEventType = z.infer<typeof LedgerEventType>;

const Seq = z.number().int().positive();

export const RunStartedEvent = z.object({
  seq: Seq,
  timestamp: TimestampIso,
  type: z.literal('run_started'),
  data: z.object({
    runId: z.string(),
    branch: z.string(),
    stage: z.string().nullable(),
    changedFiles: z.number().int().nonnegative(),
    appliedRules: z.array(z.string()).default([])
  })
});

export const GateFinishedEvent = z.object({
  seq: Seq,
  timestamp: TimestampIso,
  type: z.literal('gate_finished'),
  data: z.object({
    runId: z.string(),
    gate: z.string(),
    status: z.enum(['passed', 'failed', 'skipped', 'blocked', 'not_run']),
    durationMs: z.number().nonnegative()
  })
});

export const RunCompletedEvent = z.object({
  seq: Seq,
  timestamp: TimestampIso,
  type: z.literal('run_completed'),
  data: z.object({
    runId: z.string(),
    passed: z.boolean(),
    failedCount: z.number().int().nonnegative(),
    totalCount: z.number().int().nonnegative(),
    durationMs: z.number().nonnegative()
  })
});

export const BypassRecordedEvent = z.object({
  seq: Seq,
  timestamp: TimestampIso,
  type: z.literal('bypass_recorded'),
  data: z.object({
    user: z.string(),
    reason: z.string(),
    branch: z.string(),
    recordPath: z.string(),
    bypassedGates: z.array(z.string())
  })
});

export const LedgerEntrySchema = z.discriminatedUnion('type', [
  RunStartedEvent,
  GateFinishedEvent,
  RunCompletedEvent,
  BypassRecordedEvent
]);

export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;

type WithoutEnvelope<T> = T extends unknown ? Omit<T, 'seq' | 'timestamp'> : never;

export type LedgerEntryInput = WithoutEnvelope<LedgerEntry>;
