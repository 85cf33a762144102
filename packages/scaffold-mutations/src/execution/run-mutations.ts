import type {
  Mutation,
  MutationContext,
  MutationOutcome,
  MutationResult
} from "../types.js";
import { applyMutation, resolveDetails } from "./apply-mutation.js";

/**
 * Execute an array of mutations in order, stopping at the first failure.
 *
 * All dependencies must be injected - no defaults, no globals.
 */
export async function runMutations(
  mutations: Mutation[],
  context: MutationContext
): Promise<MutationResult> {
  const effects: MutationOutcome[] = [];
  let anyChanged = false;

  for (const mutation of mutations) {
    const outcome = await executeMutation(mutation, context);
    effects.push(outcome);
    if (outcome.changed) {
      anyChanged = true;
    }
  }

  return {
    changed: anyChanged,
    effects
  };
}

async function executeMutation(
  mutation: Mutation,
  context: MutationContext
): Promise<MutationOutcome> {
  const details = resolveDetails(mutation, context);
  context.observers?.onStart?.(details);

  try {
    const outcome = await applyMutation(mutation, details, context);
    context.observers?.onComplete?.(details, outcome);
    return outcome;
  } catch (error) {
    context.observers?.onError?.(details, error);
    throw error;
  }
}
