import { load } from "js-yaml";
import Ajv, { type ErrorObject, type SchemaObject, type ValidateFunction } from "ajv";

import type { TagSets } from "lib/timing/types.js";

import { DEFAULT_TAG_SETS, TAG_SETS_SCHEMA_PATH } from "../constants.js";
import { ConfigError, FileNotFoundError } from "../errors.js";
import { readTextFile } from "../utils/fs.js";

const ajv = new Ajv({ allErrors: true, strict: false });

const validators = new Map<string, ValidateFunction<TagSets>>();

export function defaultTagSets(): TagSets {
  return {
    write: [...DEFAULT_TAG_SETS.write],
    read: [...DEFAULT_TAG_SETS.read],
    residual: [...DEFAULT_TAG_SETS.residual]
  };
}

export async function loadTagSets(path: string, schemaPath: string = TAG_SETS_SCHEMA_PATH): Promise<TagSets> {
  const raw = await readTextFile(path);
  if (raw === null) {
    throw new FileNotFoundError(path);
  }

  let document: unknown;
  try {
    document = load(raw);
  } catch (error) {
    throw new ConfigError(`Tag sets file ${path} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }

  const validate = await getValidator(schemaPath);
  if (!validate(document)) {
    throw new ConfigError(`Tag sets file ${path} is invalid: ${formatErrors(validate.errors).join("; ")}`);
  }

  assertDisjoint(document);
  return document;
}

function assertDisjoint(tagSets: TagSets): void {
  const owner = new Map<string, keyof TagSets>();
  for (const category of ["write", "read", "residual"] as const) {
    for (const tag of tagSets[category]) {
      const previous = owner.get(tag);
      if (previous) {
        throw new ConfigError(`Tag ${tag} is listed under both ${previous} and ${category}`);
      }
      owner.set(tag, category);
    }
  }
}

async function getValidator(schemaPath: string): Promise<ValidateFunction<TagSets>> {
  const cached = validators.get(schemaPath);
  if (cached) {
    return cached;
  }
  const raw = await readTextFile(schemaPath);
  if (raw === null) {
    throw new FileNotFoundError(schemaPath);
  }
  const schema: SchemaObject = JSON.parse(raw);
  const validate = ajv.compile<TagSets>(schema);
  validators.set(schemaPath, validate);
  return validate;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) {
    return ["Unknown validation error"];
  }
  return errors.map((error) => `${error.instancePath || "/"} ${error.message ?? "invalid"}`);
}
