import * as fs from 'fs';
import Ajv from 'ajv';
import { InvalidDescriptorError } from '../errors';
import type { DescriptorModel } from './types';

/** JSON Schema (draft-07) for a descriptor model document. */
export const DESCRIPTOR_MODEL_SCHEMA = {
  $id: 'asn1-jer-ts/descriptor-model',
  type: 'object',
  additionalProperties: { $ref: '#/definitions/module' },
  definitions: {
    module: {
      type: 'object',
      required: ['types'],
      properties: {
        types: {
          type: 'object',
          additionalProperties: { $ref: '#/definitions/type' },
        },
        values: {
          type: 'object',
          additionalProperties: {
            type: 'object',
            required: ['kind', 'value'],
            properties: { kind: { type: 'string' }, value: {} },
          },
        },
        imports: {
          type: 'object',
          additionalProperties: { type: 'array', items: { type: 'string' } },
        },
      },
    },
    type: {
      type: 'object',
      required: ['kind'],
      properties: {
        kind: { type: 'string', minLength: 1 },
        members: { type: 'array', items: { $ref: '#/definitions/member' } },
        element: { $ref: '#/definitions/type' },
        values: { type: 'object', additionalProperties: { type: 'string' } },
        size: {
          anyOf: [
            { type: 'integer', minimum: 0 },
            {
              type: 'array',
              minItems: 2,
              maxItems: 2,
              items: { anyOf: [{ type: 'integer' }, { type: 'string' }] },
            },
          ],
        },
      },
    },
    member: {
      type: 'object',
      required: ['name'],
      properties: {
        name: { type: 'string', minLength: 1 },
        descriptor: { $ref: '#/definitions/type' },
        optional: { type: 'boolean' },
        default: {},
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateModel = ajv.compile<DescriptorModel>(DESCRIPTOR_MODEL_SCHEMA);

/** Check a parsed JSON document against the descriptor model schema. */
export function parseDescriptorModel(document: unknown): DescriptorModel {
  if (!validateModel(document)) {
    const detail = ajv.errorsText(validateModel.errors, { dataVar: 'model' });
    throw new InvalidDescriptorError(`Invalid descriptor model: ${detail}`);
  }
  return document;
}

/** Read, parse and validate a descriptor model file. */
export function loadDescriptorModel(filePath: string): DescriptorModel {
  if (!fs.existsSync(filePath)) {
    throw new InvalidDescriptorError(`Model file not found: ${filePath}`);
  }
  const text = fs.readFileSync(filePath, 'utf-8');
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new InvalidDescriptorError(`${filePath}: not valid JSON: ${reason}`);
  }
  return parseDescriptorModel(document);
}
