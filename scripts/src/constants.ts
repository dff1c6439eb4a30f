import { fileURLToPath } from "node:url";

import type { MalformedPolicy, ResidualMode, TagSets } from "lib/timing/types.js";

export const DEFAULT_INPUT_PATH = "/mnt/ramdisk/log_ckpt2.txt";
export const TAG_SETS_SCHEMA_PATH = fileURLToPath(new URL("../../lib/timing/tag_sets.schema.json", import.meta.url));

export const DEFAULT_RESIDUAL_MODE: ResidualMode = "watchlist";
export const DEFAULT_MALFORMED_POLICY: MalformedPolicy = "fail";

export const RESIDUAL_MODES: readonly ResidualMode[] = ["watchlist", "all"];
export const MALFORMED_POLICIES: readonly MalformedPolicy[] = ["fail", "skip"];

export const TAG_DELIMITER = "|";
export const FIELD_DELIMITER = ",";
export const KEY_VALUE_DELIMITER = ":";

export const AGGREGATOR_ENV_VARIABLES = {
	inputPath: "CKPT_LOG_PATH",
	tagsPath: "CKPT_TAGS_PATH",
	residualMode: "CKPT_RESIDUAL_MODE",
	onMalformed: "CKPT_ON_MALFORMED",
	jsonOut: "CKPT_JSON_OUT"
} as const;

export const DEFAULT_TAG_SETS: Readonly<TagSets> = {
	write: ["WRITE1", "WRITE2", "WRITE3", "WRITE4", "WRITE5", "WRITE6"],
	read: ["READ1", "READ2", "READ3", "READ4", "READ5"],
	residual: ["RD1", "RD2", "RD3", "RD4", "RD5", "RD6"]
};
