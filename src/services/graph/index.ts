/**
 * Graph Service Module
 *
 * Provides plan dependency graph visualization
 * with Mermaid and DOT format output.
 *
 * @module services/graph
 */

export {
  GraphService,
  GRAPH_FORMATS,
  isGraphFormat,
  type IGraphService,
  type GraphFormat,
  type GraphOptions
} from './graph-service.js';
