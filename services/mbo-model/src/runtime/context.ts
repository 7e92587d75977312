import { Series } from "../core/series.js";
import type { Timeline } from "../core/timeline.js";
import type { ModelContext, ModelOutputs } from "../types/context.js";
import type { MboModelInputs } from "../types/inputs.js";

export function createModelContext(timeline: Timeline, inputs: MboModelInputs): ModelContext {
  return {
    timeline,
    inputs,
    scenario: inputs.modules.revenue.selected_scenario ?? "base",
    outputs: {},
    interestEstimate: Series.zeros(timeline.horizonYears),
    metrics: {},
    warnings: [],
  };
}

/** Outputs of an upstream module; throws when it has not run yet. */
export function requireOutputs<K extends keyof ModelOutputs>(
  context: ModelContext,
  name: K,
): NonNullable<ModelOutputs[K]> {
  const outputs = context.outputs[name];
  if (outputs === undefined || outputs === null) {
    throw new Error(`${name} outputs are not available; run the ${name} module first`);
  }
  return outputs;
}

export function addWarning(context: ModelContext, message: string): void {
  if (!context.warnings.includes(message)) {
    context.warnings.push(message);
  }
}
