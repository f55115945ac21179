import { z } from 'zod';
import type { ClientResponse } from './ClientResponse';
import { ClientError, ResponseValidationError, type FieldErrors } from './errors';
import { resolvePath } from './objectPath';
import type { Logger } from './types';

export interface DecodeContext {
  debugLevel: number;
  logger?: Logger;
  client: unknown;
  rawResponse: ClientResponse;
}

export interface ResponseDecoder<T> {
  /** Sub-object to decode, resolved against the raw payload first. */
  readonly dataPath?: string;
  /** @throws DecoderValidationError */
  decode(data: unknown, context: DecodeContext): T;
}

export class DecoderValidationError extends Error {
  constructor(readonly errors: FieldErrors) {
    super(`Validation failed for ${Object.keys(errors).length} field(s)`);
    this.name = 'DecoderValidationError';
  }
}

/** What to do with payload keys the schema does not declare. */
export type UnknownFieldPolicy = 'strip' | 'passthrough' | 'strict';

export interface ResponseSchemaOptions<S extends z.ZodTypeAny> {
  schema: S;
  unknown?: UnknownFieldPolicy;
  dataPath?: string;
}

export interface ModelResponseSchemaOptions<S extends z.ZodTypeAny, T> extends ResponseSchemaOptions<S> {
  model: (data: z.output<S>, context: DecodeContext) => T;
}

const SCHEMA_ERROR_KEY = '_schema';

export function zodIssuesToFieldErrors(error: z.ZodError): FieldErrors {
  const errors: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : SCHEMA_ERROR_KEY;
    (errors[key] ??= []).push(issue.message);
  }
  return errors;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function declaredKeys(schema: z.ZodTypeAny): Set<string> | undefined {
  return schema instanceof z.ZodObject ? new Set(Object.keys(schema.shape)) : undefined;
}

function unknownKeys(data: unknown, declared: Set<string> | undefined): string[] {
  if (!declared || !isPlainRecord(data)) return [];
  return Object.keys(data).filter((key) => !declared.has(key));
}

/**
 * Builds a response decoder from a zod schema.
 *
 * The unknown-field policy applies to the top-level object; nested objects
 * follow their own zod configuration (`.strict()`, `.passthrough()`).
 * `model` turns the validated data into a domain object and may use the
 * decode context, e.g. to keep a reference to the client.
 */
export function defineResponseSchema<S extends z.ZodTypeAny, T>(options: ModelResponseSchemaOptions<S, T>): ResponseDecoder<T>;
export function defineResponseSchema<S extends z.ZodTypeAny>(
  options: ResponseSchemaOptions<S> & { model?: never },
): ResponseDecoder<z.output<S>>;
export function defineResponseSchema<S extends z.ZodTypeAny, T>(
  options: ResponseSchemaOptions<S> & { model?: (data: z.output<S>, context: DecodeContext) => T },
): ResponseDecoder<T | z.output<S>> {
  const policy = options.unknown ?? 'strip';
  const declared = declaredKeys(options.schema);

  return {
    dataPath: options.dataPath,
    decode(data, context) {
      const extra = unknownKeys(data, declared);
      const result = options.schema.safeParse(data);
      const errors: FieldErrors = result.success ? {} : zodIssuesToFieldErrors(result.error);
      if (policy === 'strict') {
        for (const key of extra) {
          errors[key] = ['Unknown field.'];
        }
      }
      if (!result.success || Object.keys(errors).length > 0) {
        throw new DecoderValidationError(errors);
      }

      let value: z.output<S> = result.data;
      if (policy === 'passthrough' && isPlainRecord(data) && isPlainRecord(value)) {
        const passthrough: Record<string, unknown> = {};
        for (const key of extra) passthrough[key] = data[key];
        value = Object.assign(passthrough, value);
      }
      return options.model ? options.model(value, context) : value;
    },
  };
}

/**
 * Decodes the raw payload of `response` and returns a copy carrying the
 * validated value.
 *
 * @throws ClientError when `dataPath` does not resolve
 * @throws ResponseValidationError with the field errors of the decoder
 */
export function decodeResponse<T>(
  response: ClientResponse,
  decoder: ResponseDecoder<T>,
  context: DecodeContext,
  dataPath: string | undefined = decoder.dataPath,
): ClientResponse<T> {
  let data = response.data;
  if (dataPath) {
    try {
      data = resolvePath(data, dataPath);
    } catch (error) {
      const detail = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
      throw new ClientError(response, `Could not resolve "${dataPath}" on data object: ${detail}`, { cause: error });
    }
  }

  try {
    return response.withPayload<T>({ kind: 'validated', value: decoder.decode(data, context) });
  } catch (error) {
    if (error instanceof DecoderValidationError) {
      throw new ResponseValidationError(response, { decoder, errors: error.errors });
    }
    throw error;
  }
}

export interface SchemaApplyingClient {
  applyResponseSchema<T>(response: ClientResponse, decoder: ResponseDecoder<T>, options?: { dataPath?: string }): ClientResponse<T>;
}

/** Method wrapper that decodes the response returned by `operation`. */
export function responseSchema<T>(decoder: ResponseDecoder<T>, options: { dataPath?: string } = {}) {
  return <C extends SchemaApplyingClient, A extends unknown[]>(
    operation: (this: C, ...args: A) => Promise<ClientResponse>,
  ): ((this: C, ...args: A) => Promise<ClientResponse<T>>) =>
    async function (this: C, ...args: A): Promise<ClientResponse<T>> {
      const response = await operation.apply(this, args);
      return this.applyResponseSchema(response, decoder, options);
    };
}
