/**
 * VPC Atlas — Graphviz DOT Emitter
 */

import { resourceKey } from "../catalog/catalog.js";
import type { FilterResult } from "../core/filters.js";
import type { Resource, ResourceKind, Topology, TopologyNode } from "../types.js";
import { formatConnectionLabel, formatLinkLabel, isDrawnAsNode, resourceLabelLines } from "./labels.js";

const KIND_STYLE: Record<ResourceKind, { shape: string; color: string }> = {
  instance: { shape: "box", color: "#FF9900" },
  load_balancer: { shape: "trapezium", color: "#E7157B" },
  database: { shape: "cylinder", color: "#3B48CC" },
  zone: { shape: "ellipse", color: "#8C4FFF" },
  certificate: { shape: "note", color: "#DD344C" },
  network: { shape: "box", color: "#8C4FFF" },
  subnet: { shape: "box", color: "#8C4FFF" },
};

const EDGE_COLORS = {
  firewall: "#DD344C",
  "lb-target": "#E7157B",
  "dns-alias": "#8C4FFF",
};

const CLUSTER_STYLE: Record<TopologyNode["kind"], string> = {
  account: "solid",
  region: "dashed",
  network: "solid",
  tier: "rounded",
  ungrouped: "dotted",
};

function escapeDot(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

function edgeAttrs(label: string, color: string, extra = ""): string {
  const parts = [`color="${color}"`];
  if (label) parts.unshift(`label="${escapeDot(label)}"`);
  if (extra) parts.push(extra);
  return parts.join(", ");
}

export function renderDot(topology: Topology, view: FilterResult): string {
  const hidden = new Set(view.hiddenResources);
  const nodeIds = new Map<string, string>();
  const resources = new Map<string, Resource>();
  const lines: string[] = [
    "digraph Topology {",
    "  rankdir=TB;",
    "  compound=true;",
    "  node [style=filled, fontsize=10, fontcolor=white];",
    "",
  ];
  let clusterCounter = 0;

  const drawable = (node: TopologyNode): Resource[] =>
    node.resources.filter((r) => isDrawnAsNode(r) && !hidden.has(resourceKey(r)));

  const hasContent = (node: TopologyNode): boolean =>
    drawable(node).length > 0 || node.children.some(hasContent);

  const emit = (node: TopologyNode, depth: number): void => {
    if (node.kind !== "account" && !hasContent(node)) return;
    const indent = "  ".repeat(depth);
    lines.push(`${indent}subgraph cluster_${clusterCounter++} {`);
    lines.push(`${indent}  label="${escapeDot(node.label)}";`);
    lines.push(`${indent}  style=${CLUSTER_STYLE[node.kind]};`);

    for (const resource of drawable(node)) {
      const key = resourceKey(resource);
      const id = `n${nodeIds.size}`;
      nodeIds.set(key, id);
      resources.set(key, resource);
      const { shape, color } = KIND_STYLE[resource.kind];
      const label = resourceLabelLines(resource).map(escapeDot).join("\\n");
      lines.push(`${indent}  "${id}" [label="${label}", shape=${shape}, fillcolor="${color}"];`);
    }

    for (const child of node.children) emit(child, depth + 1);
    lines.push(`${indent}}`);
  };

  emit(topology.root, 1);
  lines.push("");

  for (const connection of view.connections) {
    const from = nodeIds.get(connection.sourceId);
    const to = nodeIds.get(connection.destId);
    if (!from || !to) continue;
    const dashed = resources.get(connection.destId)?.kind === "database" ? "style=dashed" : "";
    const label = formatConnectionLabel(connection, view.renderHint.detail);
    lines.push(`  "${from}" -> "${to}" [${edgeAttrs(label, EDGE_COLORS.firewall, dashed)}];`);
  }

  for (const link of view.links) {
    const from = nodeIds.get(link.sourceId);
    const to = nodeIds.get(link.destId);
    if (!from || !to) continue;
    const bold = link.kind === "lb-target" ? "penwidth=2" : "";
    const label = formatLinkLabel(link, view.renderHint.lbDetail);
    lines.push(`  "${from}" -> "${to}" [${edgeAttrs(label, EDGE_COLORS[link.kind], bold)}];`);
  }

  lines.push("}");
  return lines.join("\n") + "\n";
}
