import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';

const ClockTimeSchema = z.string().regex(/^(([01]\d|2[0-3]):[0-5]\d|24:00)$/);

const CategoryRatesSchema = z.object({
  label: z.string().min(1),
  weekday: z.number().int().nonnegative(),
  weekend: z.number().int().nonnegative(),
});

const CourtSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  colorTag: z.string().default('9'),
});

export const GroundPolicySchema = z
  .object({
    groundName: z.string().default('Riverside Ground'),
    timezone: z.string().default('Asia/Tokyo'),
    courts: z
      .array(CourtSchema)
      .min(1)
      .default([
        { id: 'turf', label: 'Artificial turf', colorTag: '9' },
        { id: 'grass', label: 'Natural grass', colorTag: '6' },
      ]),
    defaultCourt: z.string().default('turf'),
    // 0 = Sunday ... 6 = Saturday
    weekendDays: z.array(z.number().int().min(0).max(6)).default([0, 6]),
    businessHours: z
      .object({ open: ClockTimeSchema, close: ClockTimeSchema })
      .default({ open: '07:00', close: '21:00' }),
    serializeCommits: z.boolean().default(true),
    lockTimeoutMs: z.number().int().positive().default(5000),
    pricing: z
      .object({
        minBookingHours: z.number().int().positive().default(2),
        unitHours: z.number().int().positive().default(2),
        defaultCategory: z.string().default('general'),
        categories: z.record(CategoryRatesSchema).default({
          elementary: { label: 'Elementary school', weekday: 6000, weekend: 7000 },
          middle_high: { label: 'Middle/High school', weekday: 7000, weekend: 8000 },
          general: { label: 'General', weekday: 12000, weekend: 13000 },
        }),
        paymentMethod: z.string().default('Prepaid (invoice)'),
      })
      .default({}),
  })
  .superRefine((policy, ctx) => {
    if (!policy.courts.some((court) => court.id === policy.defaultCourt)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaultCourt'],
        message: `Default court "${policy.defaultCourt}" is not a configured court`,
      });
    }
    if (!(policy.pricing.defaultCategory in policy.pricing.categories)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['pricing', 'defaultCategory'],
        message: `Default category "${policy.pricing.defaultCategory}" has no rates`,
      });
    }
  });

export type GroundPolicyInput = z.input<typeof GroundPolicySchema>;

export interface CategoryRates {
  readonly label: string;
  readonly weekday: number;
  readonly weekend: number;
}

export interface Court {
  readonly id: string;
  readonly label: string;
  readonly colorTag: string;
}

export interface GroundPolicy {
  readonly groundName: string;
  readonly timezone: string;
  readonly courts: readonly Court[];
  readonly defaultCourt: string;
  readonly weekendDays: readonly number[];
  readonly businessHours: { readonly open: string; readonly close: string };
  readonly serializeCommits: boolean;
  readonly lockTimeoutMs: number;
  readonly pricing: {
    readonly minBookingHours: number;
    readonly unitHours: number;
    readonly defaultCategory: string;
    readonly categories: Readonly<Record<string, CategoryRates>>;
    readonly paymentMethod: string;
  };
}

/**
 * Validates a raw policy object (missing keys take the built-in defaults) and
 * returns a frozen copy.
 */
export function createGroundPolicy(input: GroundPolicyInput = {}): GroundPolicy {
  return freezePolicy(GroundPolicySchema.parse(input));
}

function freezePolicy(parsed: z.output<typeof GroundPolicySchema>): GroundPolicy {
  return Object.freeze({
    ...parsed,
    courts: Object.freeze(parsed.courts.map((court) => Object.freeze(court))),
    weekendDays: Object.freeze([...parsed.weekendDays]),
    businessHours: Object.freeze(parsed.businessHours),
    pricing: Object.freeze({
      ...parsed.pricing,
      categories: Object.freeze(
        Object.fromEntries(
          Object.entries(parsed.pricing.categories).map(([key, rates]) => [
            key,
            Object.freeze(rates),
          ]),
        ),
      ),
    }),
  });
}

export type PolicySource = 'file' | 'defaults';

export function loadGroundPolicy(path: string): {
  policy: GroundPolicy;
  source: PolicySource;
} {
  if (!existsSync(path)) {
    return { policy: createGroundPolicy(), source: 'defaults' };
  }

  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return { policy: freezePolicy(GroundPolicySchema.parse(raw)), source: 'file' };
}
