/**
 * Nest scenarios into describe blocks by their category path
 */

import type { DescribeNode, Scenario } from "./types.js";

const createNode = (name: string): DescribeNode => ({
  name,
  children: new Map(),
  tests: [],
});

const nodeAt = (root: DescribeNode, parts: readonly string[]): DescribeNode =>
  parts.reduce((parent, part) => {
    const existing = parent.children.get(part);
    if (existing) return existing;
    const child = createNode(part);
    parent.children.set(part, child);
    return child;
  }, root);

export const buildDescribeTree = (
  scenarios: readonly Scenario[]
): DescribeNode | null => {
  if (scenarios.length === 0) return null;

  const root = createNode("Golden Tests");
  for (const scenario of scenarios) {
    nodeAt(root, scenario.pathParts).tests.push(scenario);
  }
  return root;
};
