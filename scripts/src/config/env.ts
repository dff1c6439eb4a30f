import type { MalformedPolicy, ResidualMode } from "lib/timing/types.js";

import {
  AGGREGATOR_ENV_VARIABLES,
  DEFAULT_INPUT_PATH,
  DEFAULT_MALFORMED_POLICY,
  DEFAULT_RESIDUAL_MODE,
  MALFORMED_POLICIES,
  RESIDUAL_MODES
} from "../constants.js";
import { ConfigError } from "../errors.js";

export interface AggregatorConfig {
  inputPath: string;
  tagsPath: string | null;
  residualMode: ResidualMode;
  onMalformed: MalformedPolicy;
  jsonOut: string | null;
}

/** Values as they come out of the CLI parser; flags win over the environment. */
export interface AggregatorFlags {
  input?: string;
  tags?: string;
  residual?: string;
  "on-malformed"?: string;
  json?: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

function parseChoice<T extends string>(
  value: string | undefined,
  choices: readonly T[],
  fallback: T,
  label: string
): T {
  if (value === undefined) {
    return fallback;
  }
  const match = choices.find((choice) => choice === value.toLowerCase());
  if (!match) {
    throw new ConfigError(`Invalid ${label} "${value}"; expected one of ${choices.join(", ")}`);
  }
  return match;
}

export function resolveAggregatorConfig(
  flags: AggregatorFlags = {},
  env: NodeJS.ProcessEnv = process.env
): AggregatorConfig {
  const pick = (flag: string | undefined, variable: string) => nonEmpty(flag) ?? nonEmpty(env[variable]);

  return {
    inputPath: pick(flags.input, AGGREGATOR_ENV_VARIABLES.inputPath) ?? DEFAULT_INPUT_PATH,
    tagsPath: pick(flags.tags, AGGREGATOR_ENV_VARIABLES.tagsPath) ?? null,
    residualMode: parseChoice(
      pick(flags.residual, AGGREGATOR_ENV_VARIABLES.residualMode),
      RESIDUAL_MODES,
      DEFAULT_RESIDUAL_MODE,
      "residual mode"
    ),
    onMalformed: parseChoice(
      pick(flags["on-malformed"], AGGREGATOR_ENV_VARIABLES.onMalformed),
      MALFORMED_POLICIES,
      DEFAULT_MALFORMED_POLICY,
      "malformed-line policy"
    ),
    jsonOut: pick(flags.json, AGGREGATOR_ENV_VARIABLES.jsonOut) ?? null
  };
}
