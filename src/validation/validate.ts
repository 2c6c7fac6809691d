import fs from "fs";
import path from "path";
import Ajv2020 from "ajv/dist/2020";
import { getRepoRoot } from "../paths";

let cached: { root: string; ajv: Ajv2020 } | null = null;

type SchemaDocument = { $id?: string };

function loadSchemas(root: string): Map<string, SchemaDocument> {
  const schemaDir = path.join(root, "schemas");
  const schemaFiles = fs.readdirSync(schemaDir).filter((file) => file.endsWith(".schema.json"));
  const schemas = new Map<string, SchemaDocument>();
  for (const file of schemaFiles) {
    const schemaPath = path.join(schemaDir, file);
    const schema = JSON.parse(fs.readFileSync(schemaPath, "utf-8")) as SchemaDocument;
    if (!schema.$id) {
      schema.$id = file;
    }
    schemas.set(file, schema);
  }
  return schemas;
}

function getAjv(): Ajv2020 {
  const root = getRepoRoot();
  if (cached && cached.root === root) {
    return cached.ajv;
  }
  const ajv = new Ajv2020({ allErrors: true, allowUnionTypes: true });
  for (const schema of loadSchemas(root).values()) {
    ajv.addSchema(schema, schema.$id);
  }
  cached = { root, ajv };
  return ajv;
}

export function validateJson(schemaFile: string, data: unknown): { valid: boolean; errors: string[] } {
  const validate = getAjv().getSchema(schemaFile);
  if (!validate) {
    return { valid: false, errors: [`Schema not found: ${schemaFile}`] };
  }
  const valid = validate(data);
  const errors = (validate.errors ?? []).map((error) => `${error.instancePath} ${error.message}`.trim());
  return { valid: Boolean(valid), errors };
}
