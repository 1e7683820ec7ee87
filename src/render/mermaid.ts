/**
 * VPC Atlas — Mermaid Emitter
 *
 * Renders a topology as a Mermaid flowchart: one nested subgraph per
 * account, region, network and tier, one node per drawable resource.
 */

import { resourceKey } from "../catalog/catalog.js";
import type { FilterResult } from "../core/filters.js";
import type { Resource, Topology, TopologyNode } from "../types.js";
import { formatConnectionLabel, formatLinkLabel, isDrawnAsNode, resourceLabelLines } from "./labels.js";

/** Mermaid shape delimiters by resource kind. */
function getNodeShape(resource: Resource): [string, string] {
  switch (resource.kind) {
    case "database":
      return ["[(", ")]"];
    case "load_balancer":
      return ["[/", "\\]"];
    case "zone":
      return ["([", "])"];
    case "certificate":
      return ["[[", "]]"];
    default:
      return ["[", "]"];
  }
}

function escapeLabel(text: string): string {
  return text.replace(/"/g, "#quot;");
}

function edgeLine(from: string, arrow: string, label: string, to: string): string {
  return label ? `    ${from} ${arrow}|"${escapeLabel(label)}"| ${to}` : `    ${from} ${arrow} ${to}`;
}

export function renderMermaid(topology: Topology, view: FilterResult): string {
  const hidden = new Set(view.hiddenResources);
  const nodeIds = new Map<string, string>();
  const resources = new Map<string, Resource>();
  const lines: string[] = ["graph TD"];
  let clusterCounter = 0;

  const drawable = (node: TopologyNode): Resource[] =>
    node.resources.filter((r) => isDrawnAsNode(r) && !hidden.has(resourceKey(r)));

  const hasContent = (node: TopologyNode): boolean =>
    drawable(node).length > 0 || node.children.some(hasContent);

  const emit = (node: TopologyNode, depth: number): void => {
    if (node.kind !== "account" && !hasContent(node)) return;
    const indent = "    ".repeat(depth);
    lines.push(`${indent}subgraph c${clusterCounter++}["${escapeLabel(node.label)}"]`);

    for (const resource of drawable(node)) {
      const key = resourceKey(resource);
      const id = `n${nodeIds.size}`;
      nodeIds.set(key, id);
      resources.set(key, resource);
      const [open, close] = getNodeShape(resource);
      const label = resourceLabelLines(resource).map(escapeLabel).join("<br/>");
      lines.push(`${indent}    ${id}${open}"${label}"${close}`);
    }

    for (const child of node.children) emit(child, depth + 1);
    lines.push(`${indent}end`);
  };

  emit(topology.root, 1);

  for (const connection of view.connections) {
    const from = nodeIds.get(connection.sourceId);
    const to = nodeIds.get(connection.destId);
    if (!from || !to) continue;
    const arrow = resources.get(connection.destId)?.kind === "database" ? "-.->" : "-->";
    lines.push(edgeLine(from, arrow, formatConnectionLabel(connection, view.renderHint.detail), to));
  }

  for (const link of view.links) {
    const from = nodeIds.get(link.sourceId);
    const to = nodeIds.get(link.destId);
    if (!from || !to) continue;
    const arrow = link.kind === "lb-target" ? "==>" : "-->";
    lines.push(edgeLine(from, arrow, formatLinkLabel(link, view.renderHint.lbDetail), to));
  }

  return lines.join("\n") + "\n";
}

/** Markdown document wrapping the diagram, for files. */
export function wrapMermaidMarkdown(diagram: string, title = "Network Topology"): string {
  return `# ${title}\n\n\`\`\`mermaid\n${diagram.trimEnd()}\n\`\`\`\n`;
}

// =============================================================================
// Validation
// =============================================================================

export type MermaidValidation =
  | { valid: true; subgraphs: number }
  | { valid: false; error: string };

const FENCE = /```mermaid\n([\s\S]*?)```/;

/**
 * Structural check of a flowchart without rendering it: a `graph` or
 * `flowchart` header and balanced `subgraph` / `end` blocks. A Markdown
 * document is reduced to its first mermaid fence. Line numbers count
 * from the start of the diagram.
 */
export function validateMermaid(text: string): MermaidValidation {
  const body = FENCE.exec(text)?.[1] ?? text;
  const lines = body.replace(/\r\n/g, "\n").split("\n");

  const first = lines.findIndex((line) => line.trim() !== "");
  if (first < 0 || !/^(graph|flowchart)\b/.test(lines[first].trim())) {
    return { valid: false, error: "Diagram must start with a 'graph' directive" };
  }

  let open = 0;
  let subgraphs = 0;
  for (let i = first; i < lines.length; i++) {
    const line = lines[i].trim();
    if (/^subgraph\b/.test(line)) {
      open++;
      subgraphs++;
    } else if (line === "end") {
      open--;
      if (open < 0) return { valid: false, error: `Unmatched 'end' at line ${i + 1}` };
    }
  }

  if (open > 0) {
    return { valid: false, error: `Unclosed subgraph (missing ${open} 'end' statement${open === 1 ? "" : "s"})` };
  }
  return { valid: true, subgraphs };
}
