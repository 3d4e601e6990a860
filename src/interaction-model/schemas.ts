// Accepted layouts for stored interaction models.

/** Node-link layout written by graph libraries (links may also be named edges) */
export interface NodeLinkRecord {
  directed?: boolean;
  nodes: { id: string }[];
  links?: { source: string; target: string }[];
  edges?: { source: string; target: string }[];
}

export interface EdgeListRecord {
  nodes?: string[];
  edges: ([string, string] | { from: string; to: string })[];
}

export interface AdjacencyRecord {
  transitions: Record<string, string[]>;
}

const label = { type: 'string', minLength: 1 };

const linkSchema = {
  type: 'array',
  items: {
    type: 'object',
    required: ['source', 'target'],
    properties: { source: label, target: label },
  },
};

export const nodeLinkSchema = {
  type: 'object',
  required: ['nodes'],
  anyOf: [
    { type: 'object', required: ['links'] },
    { type: 'object', required: ['edges'] },
  ],
  properties: {
    directed: { type: 'boolean', const: true },
    nodes: {
      type: 'array',
      items: { type: 'object', required: ['id'], properties: { id: label } },
    },
    links: linkSchema,
    edges: linkSchema,
  },
};

export const edgeListSchema = {
  type: 'object',
  required: ['edges'],
  properties: {
    nodes: { type: 'array', items: label },
    edges: {
      type: 'array',
      items: {
        anyOf: [
          { type: 'array', minItems: 2, maxItems: 2, items: label },
          {
            type: 'object',
            required: ['from', 'to'],
            properties: { from: label, to: label },
          },
        ],
      },
    },
  },
};

export const adjacencySchema = {
  type: 'object',
  required: ['transitions'],
  properties: {
    transitions: {
      type: 'object',
      additionalProperties: { type: 'array', items: label },
    },
  },
};
