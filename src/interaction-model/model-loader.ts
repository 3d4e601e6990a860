import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import yaml from 'js-yaml';
import { InteractionModel, Transition } from './interaction-model';
import {
  AdjacencyRecord,
  EdgeListRecord,
  NodeLinkRecord,
  adjacencySchema,
  edgeListSchema,
  nodeLinkSchema,
} from './schemas';
import { InteractionModelError, errorMessage } from '../errors';
import { logger } from '../observability/logger';

const ajv = new Ajv({ allErrors: true });
const validateAdjacency = ajv.compile<AdjacencyRecord>(adjacencySchema);
const validateNodeLink = ajv.compile<NodeLinkRecord>(nodeLinkSchema);
const validateEdgeList = ajv.compile<EdgeListRecord>(edgeListSchema);

const log = logger.child({ component: 'interaction-model-loader' });

/**
 * Load an interaction model from a `.json`, `.yaml` or `.yml` file.
 * Throws InteractionModelError when the file is unreadable or in no known layout.
 */
export function loadInteractionModel(filePath: string): InteractionModel {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new InteractionModelError(`Cannot read interaction model ${filePath}: ${errorMessage(err)}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  let data: unknown;
  try {
    data = ext === '.yaml' || ext === '.yml' ? yaml.load(content) : JSON.parse(content);
  } catch (err) {
    throw new InteractionModelError(`Cannot parse interaction model ${filePath}: ${errorMessage(err)}`);
  }

  const model = parseInteractionModel(data);
  log.info({ filePath, nodes: model.labels.length, edges: model.edgeCount }, 'Interaction model loaded');
  return model;
}

export function parseInteractionModel(data: unknown): InteractionModel {
  if (validateAdjacency(data)) {
    return InteractionModel.fromAdjacency(data.transitions);
  }
  if (validateNodeLink(data)) {
    const links = data.links ?? data.edges ?? [];
    return InteractionModel.fromSpec({
      nodes: data.nodes.map((n) => n.id),
      edges: links.map((l): Transition => [l.source, l.target]),
    });
  }
  if (validateEdgeList(data)) {
    return InteractionModel.fromSpec({
      ...(data.nodes ? { nodes: data.nodes } : {}),
      edges: data.edges.map((e): Transition => (Array.isArray(e) ? [e[0], e[1]] : [e.from, e.to])),
    });
  }
  throw new InteractionModelError(
    'Interaction model matches no known layout (expected transitions adjacency, node-link graph or edge list)',
  );
}
