import { z } from "zod";
import { CounterStateCorruptError } from "./errors.js";
import { CounterState } from "./types.js";

const CounterStateSchema = z.record(z.string(), z.number().int().positive());

/**
 * Parses the persisted counter state (tag -> next number to hand out).
 * Anything malformed is an error rather than an empty state, since starting
 * over would hand out numbers that are already in the log.
 */
export function parseCounterState(raw: string, path: string): CounterState {
  if (raw.trim() === "") {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CounterStateCorruptError(path, `invalid JSON (${(error as Error).message})`);
  }

  const result = CounterStateSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
    throw new CounterStateCorruptError(path, `${issue.message}${where}`);
  }
  return result.data;
}

export function serializeCounterState(state: CounterState): string {
  const sorted: CounterState = {};
  for (const tag of Object.keys(state).sort()) {
    sorted[tag] = state[tag];
  }
  return JSON.stringify(sorted, null, 2) + "\n";
}

/**
 * Hands out the next number for `tag` and returns the advanced state.
 * Numbers already present in the log are not consulted.
 */
export function reserve(
  state: CounterState,
  tag: string
): { number: number; state: CounterState } {
  const number = Object.hasOwn(state, tag) ? state[tag] : 1;
  return { number, state: { ...state, [tag]: number + 1 } };
}
