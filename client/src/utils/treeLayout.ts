import { hierarchy, tree, type HierarchyPointNode } from 'd3';
import { formatPath, truncateLabel, type NodePath, type StoryNode } from '@branching-stories/shared';

export const NODE_SPACING = 180;
export const LEVEL_SPACING = 110;

export interface LayoutNode {
  key: string;
  path: NodePath;
  x: number;
  y: number;
  label: string;
  node: StoryNode;
  classes: string[];
}

export interface LayoutLink {
  key: string;
  kind: 'tree' | 'merge';
  d: string;
}

export interface LayoutBounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

export interface TreeLayout {
  nodes: LayoutNode[];
  links: LayoutLink[];
  bounds: LayoutBounds;
}

export interface ViewTransform {
  x: number;
  y: number;
  k: number;
}

interface Point {
  x: number;
  y: number;
}

// Vertical cubic curve; merge links bow out further so they read apart from tree links
export function curvePath(source: Point, target: Point, bend: number): string {
  return (
    `M${source.x},${source.y}` +
    `C${source.x},${source.y + bend}` +
    ` ${target.x},${target.y - bend}` +
    ` ${target.x},${target.y}`
  );
}

function pathOf(point: HierarchyPointNode<StoryNode>): NodePath {
  const path: NodePath = [];
  let current = point;
  while (current.parent) {
    path.unshift(current.parent.children?.indexOf(current) ?? 0);
    current = current.parent;
  }
  return path;
}

// Selection is toggled on the rendered nodes, so it is not part of the layout
export function nodeClasses(node: StoryNode): string[] {
  const classes = ['node', node.children.length > 0 ? 'node--internal' : 'node--leaf'];
  if (node.mergeTarget) classes.push('merge-node');
  if (node.achievement) classes.push('achievement-node');
  return classes;
}

/**
 * Where the view starts after a redraw: the user's last pan and zoom when
 * there is one, otherwise the tree centered horizontally at the top.
 */
export function initialView(
  saved: ViewTransform | null,
  bounds: LayoutBounds,
  width: number,
  topMargin: number
): ViewTransform {
  if (saved) return saved;
  return { x: width / 2 - (bounds.minX + bounds.maxX) / 2, y: topMargin, k: 1 };
}

/**
 * Top-down tree layout with a fixed cell per node. Merge nodes also get a
 * dashed link to their target; targets that no longer exist get none.
 */
export function layoutStory(root: StoryNode): TreeLayout {
  const laidOut = tree<StoryNode>().nodeSize([NODE_SPACING, LEVEL_SPACING])(
    hierarchy(root, node => node.children)
  );

  const positions = new Map<string, Point>();
  const nodes: LayoutNode[] = laidOut.descendants().map(point => {
    const path = pathOf(point);
    const key = formatPath(path);
    positions.set(key, { x: point.x, y: point.y });
    return {
      key,
      path,
      x: point.x,
      y: point.y,
      label: truncateLabel(point.data.name),
      node: point.data,
      classes: nodeClasses(point.data),
    };
  });

  const links: LayoutLink[] = laidOut.links().map((link): LayoutLink => ({
    key: `${formatPath(pathOf(link.source))}>${formatPath(pathOf(link.target))}`,
    kind: 'tree',
    d: curvePath(link.source, link.target, 50),
  }));

  for (const entry of nodes) {
    const targetPath = entry.node.mergeTarget;
    const target = targetPath && positions.get(formatPath(targetPath));
    if (!targetPath || !target) continue;
    links.push({
      key: `${entry.key}~${formatPath(targetPath)}`,
      kind: 'merge',
      d: curvePath(entry, target, 100),
    });
  }

  const xs = nodes.map(n => n.x);
  const ys = nodes.map(n => n.y);
  return {
    nodes,
    links,
    bounds: {
      minX: Math.min(...xs),
      maxX: Math.max(...xs),
      minY: Math.min(...ys),
      maxY: Math.max(...ys),
    },
  };
}
