import Ajv2020Module from "ajv/dist/2020.js";
import addFormatsModule from "ajv-formats";
import type { ValidateFunction, ErrorObject } from "ajv";

// どちらも CommonJS なので default は module.exports 側に載っている
const Ajv2020 = Ajv2020Module.default;
const addFormats = addFormatsModule.default;

const ajv = new Ajv2020({ allErrors: true, strict: false });
addFormats(ajv);

/** zod-to-json-schema の出力は draft-07 の $schema を持つので、2020 の検証器に渡す前に外す */
export function compileSchema(schema: object): ValidateFunction {
    const body: Record<string, unknown> = { ...schema };
    delete body.$schema;
    return ajv.compile(body);
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
    return (errors ?? [])
        .map((e: ErrorObject) => `${e.instancePath || "/"} ${e.message}`)
        .join("; ");
}

export class SchemaValidationError extends Error {
    readonly errors: ErrorObject[];
    constructor(errors: ErrorObject[] | null | undefined) {
        super(`Schema validation failed: ${formatSchemaErrors(errors)}`);
        this.name = "SchemaValidationError";
        this.errors = errors ?? [];
    }
}

export function assertValid<T>(
    validate: ValidateFunction,
    data: unknown
): asserts data is T {
    if (!validate(data)) {
        throw new SchemaValidationError(validate.errors);
    }
}
