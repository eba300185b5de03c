import Ajv from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";

export type SchemaName = "board_config" | "post_input" | "wanted_update" | "accept_input";

export type SchemaFieldError = {
  field: string;
  message: string;
};

/**
 * Locates the YAML schema directory: next to the sources, or, from a
 * compiled build, back in the package tree.
 */
function resolveSchemaDir(): string {
  const candidates = [
    path.resolve(__dirname, "../../schemas"),
    path.resolve(__dirname, "../../../../packages/core/schemas"),
  ];
  const found = candidates.find(candidate => fs.existsSync(path.join(candidate, "board_config.yaml")));
  return found ?? candidates[0] ?? __dirname;
}

export function schemaPath(name: SchemaName): string {
  return path.join(resolveSchemaDir(), `${name}.yaml`);
}

/**
 * Singleton cache for schema validators to avoid repeated I/O and AJV compilation.
 */
export class SchemaValidationCache {
  private static validators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true });
      addFormats(this.ajv);
    }
    return this.ajv;
  }

  /**
   * Gets or creates a cached validator for the specified schema path.
   * @param schemaPath Absolute path to the YAML schema file
   */
  static getValidator(schemaPath: string): ValidateFunction {
    const cached = this.validators.get(schemaPath);
    if (cached) {
      return cached;
    }

    const schemaContent = fs.readFileSync(schemaPath, "utf8");
    const schema = yaml.load(schemaContent);
    if (typeof schema !== "object" || schema === null) {
      throw new Error(`Schema ${schemaPath} is not a YAML mapping`);
    }
    const validator = this.getAjv().compile(schema);
    this.validators.set(schemaPath, validator);
    return validator;
  }

  static getNamedValidator(name: SchemaName): ValidateFunction {
    return this.getValidator(schemaPath(name));
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.validators.clear();
    this.ajv = null;
  }

  static getCacheStats(): { cachedSchemas: number; schemasLoaded: string[] } {
    return {
      cachedSchemas: this.validators.size,
      schemasLoaded: Array.from(this.validators.keys())
    };
  }
}

/**
 * Flattens AJV errors into one entry per offending field.
 */
export function toFieldErrors(errors: ErrorObject[] | null | undefined): SchemaFieldError[] {
  return (errors ?? []).map(error => {
    const missing: unknown = error.params["missingProperty"];
    const extra: unknown = error.params["additionalProperty"];
    let field = error.instancePath.replace(/^\//, "").replace(/\//g, ".");
    if (typeof missing === "string") {
      field = field ? `${field}.${missing}` : missing;
    } else if (typeof extra === "string") {
      field = field ? `${field}.${extra}` : extra;
    }
    return { field: field || "(root)", message: error.message ?? "is invalid" };
  });
}
