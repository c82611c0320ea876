import { z } from 'zod';

/**
 * Marketplace domain entities
 *
 * The marketplace answers with loosely shaped JSON. Every payload is run
 * through one of these schemas before the rest of the code sees it.
 */

const idSchema = z.union([z.string(), z.number()]).transform((value) => String(value));
const statusSchema = z.union([z.string(), z.number()]);

export const InstanceSchema = z
  .object({
    id: idSchema,
    status: statusSchema.nullish(),
    background: z.string().nullish().transform((value) => value ?? ''),
    reward_estimation_id: z.union([z.string(), z.number()]).nullish(),
  })
  .passthrough();

export const ChatMessageSchema = z.object({
  sender: z.string(),
  message: z.string(),
  timestamp: z.union([z.string(), z.number()]),
});

export const ChatMessageListSchema = z.array(ChatMessageSchema);

/**
 * The chat endpoint reports problems as an object with a `detail` field
 * instead of a message list.
 */
export const ChatErrorSchema = z.object({ detail: z.unknown() }).passthrough();

export const ProposalSchema = z
  .object({
    instance_id: idSchema,
    status: statusSchema,
    creation_date: z.string(),
  })
  .passthrough();

export const ProposalListSchema = z.array(ProposalSchema);

export type Instance = z.infer<typeof InstanceSchema>;
export type ChatMessage = z.infer<typeof ChatMessageSchema>;
export type Proposal = z.infer<typeof ProposalSchema>;
export type StatusCode = z.infer<typeof statusSchema>;

/**
 * Why a marketplace call produced nothing:
 * - `transport`: network error, timeout or non-2xx answer
 * - `invalid`: a 2xx answer whose body does not have the expected shape
 * - `rejected`: the marketplace answered with an error object in the body
 */
export type MarketFailureKind = 'transport' | 'invalid' | 'rejected';

/**
 * Outcome of a marketplace call. Failures carry a reason for the log,
 * never an exception.
 */
export type MarketResult<T> =
  | { ok: true; value: T }
  | { ok: false; kind: MarketFailureKind; reason: string; status?: number };

/**
 * Short-lived record built once per polling cycle for an eligible instance
 */
export interface InstanceToSolve {
  readonly instance: Instance;
  readonly messagesHistory?: string;
  readonly messageCount: number;
  readonly providerNeedsResponse: boolean;
}

/**
 * Deployment flavour: reward estimation or code-review replies
 */
export type SolverMode = 'reward' | 'review';

export function marketOk<T>(value: T): MarketResult<T> {
  return { ok: true, value };
}

export function marketFailure<T>(
  kind: MarketFailureKind,
  reason: string,
  status?: number
): MarketResult<T> {
  return { ok: false, kind, reason, status };
}

/**
 * Status codes may arrive as numbers or numeric strings
 */
export function sameStatus(actual: StatusCode | null | undefined, expected: StatusCode): boolean {
  if (actual === null || actual === undefined) return false;
  return String(actual) === String(expected);
}
