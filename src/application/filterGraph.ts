import { RenderError } from "../domain/errors";

export type FilterName =
  | "trim"
  | "atrim"
  | "setpts"
  | "asetpts"
  | "fps"
  | "format"
  | "aformat"
  | "setsar"
  | "scale"
  | "crop"
  | "split"
  | "asplit"
  | "boxblur"
  | "overlay"
  | "zoompan"
  | "hflip"
  | "eq"
  | "drawtext"
  | "xfade"
  | "acrossfade"
  | "concat"
  | "atempo"
  | "asetrate"
  | "aresample"
  | "anoisesrc"
  | "anullsrc"
  | "amix"
  | "volume";

export type FilterParams = Record<string, string | number>;

export interface FilterNode {
  filter: FilterName;
  inputs: string[];
  outputs: string[];
  params: FilterParams;
}

export interface FilterGraph {
  /** Streams of input file 0 that nodes may read, e.g. `0:v`. */
  sources: string[];
  nodes: FilterNode[];
  outputs: { video: string; audio: string };
}

/** Accumulates nodes in order and hands out unique pad labels. */
export class FilterGraphDraft {
  private readonly nodes: FilterNode[] = [];
  private counter = 0;

  constructor(private readonly sources: string[]) {}

  pad(prefix: string) {
    const label = `${prefix}${this.counter}`;
    this.counter += 1;
    return label;
  }

  add(filter: FilterName, inputs: string[], params: FilterParams = {}, outputCount = 1) {
    const outputs = Array.from({ length: outputCount }, () => this.pad("p"));
    this.nodes.push({ filter, inputs, outputs, params });
    return outputs;
  }

  /** Single-input, single-output step; returns the new pad. */
  then(input: string, filter: FilterName, params: FilterParams = {}) {
    return this.add(filter, [input], params)[0];
  }

  finish(outputs: { video: string; audio: string }): FilterGraph {
    const graph = { sources: [...this.sources], nodes: [...this.nodes], outputs };
    validateFilterGraph(graph);
    return graph;
  }
}

export function validateFilterGraph(graph: FilterGraph) {
  const available = new Set(graph.sources);
  const consumed = new Set<string>();

  graph.nodes.forEach((node, index) => {
    for (const input of node.inputs) {
      if (!available.has(input)) {
        throw invalid(`node ${index} (${node.filter}) reads [${input}] before it is produced`);
      }
      if (consumed.has(input)) {
        throw invalid(`pad [${input}] is consumed more than once`);
      }
      consumed.add(input);
    }
    for (const output of node.outputs) {
      if (available.has(output)) {
        throw invalid(`pad [${output}] is produced more than once`);
      }
      available.add(output);
    }
  });

  for (const output of [graph.outputs.video, graph.outputs.audio]) {
    if (!available.has(output) || graph.sources.includes(output)) {
      throw invalid(`output pad [${output}] is not produced by any node`);
    }
    if (consumed.has(output)) {
      throw invalid(`output pad [${output}] is also consumed inside the graph`);
    }
  }
}

export function serializeFilterGraph(graph: FilterGraph) {
  return graph.nodes.map(serializeNode).join(";");
}

export function serializeNode(node: FilterNode) {
  const inputs = node.inputs.map((pad) => `[${pad}]`).join("");
  const outputs = node.outputs.map((pad) => `[${pad}]`).join("");
  const params = Object.entries(node.params)
    .map(([key, value]) => `${key}=${escapeGraphLevel(escapeOptionValue(formatValue(value)))}`)
    .join(":");
  return `${inputs}${node.filter}${params ? `=${params}` : ""}${outputs}`;
}

export function formatNumber(value: number) {
  return Number(value.toFixed(4)).toString();
}

/** First level: the value as one filter option. */
export function escapeOptionValue(value: string) {
  return value.replace(/[\\':]/g, (char) => `\\${char}`);
}

/** Second level: the option string inside the filtergraph description. */
export function escapeGraphLevel(value: string) {
  return value.replace(/[\\'[\],;]/g, (char) => `\\${char}`);
}

function formatValue(value: string | number) {
  return typeof value === "number" ? formatNumber(value) : value;
}

function invalid(detail: string) {
  return new RenderError(`Invalid filter graph: ${detail}.`);
}
