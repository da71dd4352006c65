import { ValidationError } from "@/errors";
import { LineSink } from "@/types";
import type { SerializedTracedData } from "@social-media-tools/types/global";
import * as Joi from "joi";
import { TracedData } from "./TracedData";

const serializedTracedDataSchema = Joi.object<SerializedTracedData>({
  layers: Joi.array()
    .items(
      Joi.object({
        data: Joi.object().unknown(true).required(),
        metadata: Joi.object({
          user: Joi.string().required(),
          source: Joi.string().required(),
          timestamp: Joi.string().required(),
        }).required(),
      })
    )
    .min(1)
    .required(),
});

/**
 * Writes one serialized record per line.
 */
export const writeTracedDataJsonl = (
  items: TracedData[],
  sink: LineSink
): void => {
  for (const item of items) {
    sink.write(`${JSON.stringify(item.serialize())}\n`);
  }
};

const parseLine = (line: string, lineNumber: number): TracedData => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Line ${lineNumber} is not valid JSON: ${reason}`);
  }

  const { error, value } = serializedTracedDataSchema.validate(parsed);
  if (error) {
    throw new ValidationError(
      `Line ${lineNumber} is not a serialized TracedData: ${error.message}`
    );
  }
  return TracedData.deserialize(value);
};

/**
 * Reads records written by `writeTracedDataJsonl`. Blank lines are skipped.
 * @throws ValidationError naming the 1-based line that fails to parse
 */
export const readTracedDataJsonl = (content: string): TracedData[] =>
  content
    .split("\n")
    .map((line, index) => ({ line, lineNumber: index + 1 }))
    .filter(({ line }) => line.trim().length > 0)
    .map(({ line, lineNumber }) => parseLine(line, lineNumber));
