import { Ajv, type ValidateFunction } from 'ajv';

/**
 * Prior counts as stored in container files and prior JSON files:
 * symbol → positive integer.
 */
export type PriorTable = Record<string, number>;

const priorTableSchema = {
  $id: 'dyadic-coder/prior-table',
  type: 'object',
  propertyNames: { minLength: 1 },
  additionalProperties: { type: 'integer', minimum: 1 },
};

const ajv = new Ajv({ allErrors: true, strict: false });

export const validatePriorTable: ValidateFunction<PriorTable> =
  ajv.compile<PriorTable>(priorTableSchema);

/**
 * Parse and validate a prior table from JSON text.
 *
 * @param onError - Builds the error to throw; receives a description.
 */
export function parsePriorTable(
  json: string,
  onError: (message: string) => Error
): PriorTable {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw onError(`Invalid prior table JSON: ${reason}`);
  }
  if (!validatePriorTable(value)) {
    throw onError(
      `Invalid prior table: ${ajv.errorsText(validatePriorTable.errors)}`
    );
  }
  return value;
}
