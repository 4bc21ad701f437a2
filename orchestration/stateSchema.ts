/**
 * Pipeline state document schema
 */

import { z } from 'zod';

export const STATE_SCHEMA_VERSION = '1.0';
/** Versions `upgradeState` accepts */
export const PREVIOUS_STATE_VERSIONS: readonly string[] = ['0.0'];

export const DegradedModeSchema = z.object({
  enabled: z.boolean(),
  reason: z.string().nullable(),
  timestamp: z.string().nullable(),
  disabledFeatures: z.array(z.string()),
});

export type DegradedMode = z.infer<typeof DegradedModeSchema>;

export const StateMetadataSchema = z
  .object({
    createdAt: z.string(),
    lastModifiedAt: z.string(),
    lastModifiedBy: z.number().int(),
    lastChange: z.string(),
  })
  .catchall(z.unknown());

const isoTimestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'must be an ISO-8601 timestamp',
});

/**
 * Build the schema for a set of recognised phases.
 */
export function buildStateSchema(phases: readonly string[]) {
  return z
    .object({
      schemaVersion: z.literal(STATE_SCHEMA_VERSION),
      revision: z.number().int().nonnegative(),
      phase: z.string(),
      completedUnits: z.array(z.string().min(1)),
      signals: z.record(isoTimestamp),
      degradedMode: DegradedModeSchema,
      metadata: StateMetadataSchema,
    })
    .superRefine((doc, ctx) => {
      if (!phases.includes(doc.phase)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['phase'],
          message: `unrecognised phase "${doc.phase}" (expected one of ${phases.join(', ')})`,
        });
      }
      const seen = new Set<string>();
      for (const unit of doc.completedUnits) {
        if (seen.has(unit)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['completedUnits'],
            message: `duplicate unit "${unit}"`,
          });
        }
        seen.add(unit);
      }
    });
}

export type StateDocument = z.infer<ReturnType<typeof buildStateSchema>>;

export function defaultDegradedMode(): DegradedMode {
  return { enabled: false, reason: null, timestamp: null, disabledFeatures: [] };
}

export function createDefaultState(phases: readonly string[], holderPid: number): StateDocument {
  const now = new Date().toISOString();
  return {
    schemaVersion: STATE_SCHEMA_VERSION,
    revision: 0,
    phase: phases[0] ?? 'pre-init',
    completedUnits: [],
    signals: {},
    degradedMode: defaultDegradedMode(),
    metadata: {
      createdAt: now,
      lastModifiedAt: now,
      lastModifiedBy: holderPid,
      lastChange: 'init',
    },
  };
}

/**
 * Signals are append-only: existing entries may not be removed or rewritten.
 */
export function checkStateTransition(previous: StateDocument, candidate: StateDocument): string[] {
  const issues: string[] = [];
  for (const [name, at] of Object.entries(previous.signals)) {
    if (!(name in candidate.signals)) {
      issues.push(`signals.${name}: existing signal removed`);
    } else if (candidate.signals[name] !== at) {
      issues.push(`signals.${name}: existing signal rewritten`);
    }
  }
  return issues;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stateVersionOf(raw: unknown): string | undefined {
  if (!isRecord(raw)) return undefined;
  const version = raw.schemaVersion;
  return typeof version === 'string' ? version : undefined;
}

const LegacyStateSchema = z
  .object({
    schemaVersion: z.string(),
    revision: z.number().optional(),
    phase: z.string().optional(),
    completedUnits: z.array(z.unknown()).optional(),
    completedTasks: z.array(z.unknown()).optional(),
    signals: z.record(z.unknown()).optional(),
    metadata: z.record(z.unknown()).optional(),
  })
  .passthrough();

/**
 * Upgrade a document of an older schema version to the current shape.
 * Data is preserved; missing fields get defaults. Unknown phases fall back to
 * the first configured phase and are kept under `metadata.legacyPhase`.
 * A document that does not look like an older state is returned unchanged,
 * so it fails validation instead of turning into a default state.
 */
export function upgradeState(raw: unknown, phases: readonly string[], holderPid: number): unknown {
  if (!isRecord(raw) || !LegacyStateSchema.safeParse(raw).success) return raw;
  const base = createDefaultState(phases, holderPid);
  const from = stateVersionOf(raw) ?? 'legacy';
  const now = new Date().toISOString();

  const legacyUnits = Array.isArray(raw.completedUnits)
    ? raw.completedUnits
    : Array.isArray(raw.completedTasks)
      ? raw.completedTasks
      : [];
  const completedUnits = [...new Set(legacyUnits.filter((u): u is string => typeof u === 'string' && u.length > 0))];

  const signals: Record<string, string> = {};
  if (isRecord(raw.signals)) {
    for (const [name, value] of Object.entries(raw.signals)) {
      signals[name] = typeof value === 'string' && !Number.isNaN(Date.parse(value)) ? value : now;
    }
  }

  const metadata: Record<string, unknown> = isRecord(raw.metadata) ? { ...raw.metadata } : {};
  const phase = typeof raw.phase === 'string' ? raw.phase : base.phase;
  if (!phases.includes(phase)) {
    metadata.legacyPhase = phase;
  }

  const degraded = DegradedModeSchema.safeParse(raw.degradedMode);

  return {
    ...base,
    revision: typeof raw.revision === 'number' && Number.isInteger(raw.revision) && raw.revision >= 0 ? raw.revision : 0,
    phase: phases.includes(phase) ? phase : base.phase,
    completedUnits,
    signals,
    degradedMode: degraded.success ? degraded.data : base.degradedMode,
    metadata: {
      ...base.metadata,
      ...metadata,
      createdAt: typeof metadata.createdAt === 'string' ? metadata.createdAt : base.metadata.createdAt,
      lastModifiedAt: now,
      lastModifiedBy: holderPid,
      lastChange: 'migration',
      migrated: true,
      migratedFrom: from,
    },
  };
}
