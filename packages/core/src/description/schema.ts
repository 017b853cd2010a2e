import type { SchemaObject } from 'ajv';

import type { GroupKind } from '../model/variant.js';

export interface GroupDescription {
  name: string;
  typeName?: string;
  /** typeName of the sibling group (same item slot) this one extends */
  superTypeName?: string;
  validated?: boolean;
  kind?: GroupKind;
  attributes?: Record<string, ItemDescription>;
}

export interface ItemDescription {
  group?: GroupDescription;
  keyGroup?: GroupDescription;
  typeGroups?: GroupDescription[];
  keyTypeGroups?: GroupDescription[];
}

// No dots, no surrounding whitespace
const ATTRIBUTE_NAME_PATTERN = '^[^.\\s](?:[^.]*[^.\\s])?$';

export const GROUP_DESCRIPTION_SCHEMA: SchemaObject = {
  definitions: {
    group: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' },
        typeName: { type: 'string', minLength: 1 },
        superTypeName: { type: 'string', minLength: 1 },
        validated: { type: 'boolean' },
        kind: { enum: ['generic', 'fetch', 'load', 'copy'] },
        attributes: {
          type: 'object',
          propertyNames: { type: 'string', pattern: ATTRIBUTE_NAME_PATTERN },
          additionalProperties: { $ref: '#/definitions/item' },
        },
      },
    },
    item: {
      type: 'object',
      additionalProperties: false,
      properties: {
        group: { $ref: '#/definitions/group' },
        keyGroup: { $ref: '#/definitions/group' },
        typeGroups: {
          type: 'array',
          items: { $ref: '#/definitions/typedGroup' },
        },
        keyTypeGroups: {
          type: 'array',
          items: { $ref: '#/definitions/typedGroup' },
        },
      },
    },
    typedGroup: {
      type: 'object',
      required: ['typeName'],
      properties: {
        typeName: { type: 'string', minLength: 1 },
      },
      allOf: [{ $ref: '#/definitions/group' }],
    },
  },
  allOf: [{ $ref: '#/definitions/group' }],
};
