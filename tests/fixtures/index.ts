/**
 * Page fixtures stored as JSON node trees, validated on load.
 */
import { readFileSync } from 'fs';
import { z } from 'zod';
import { anno, char, shape, ContainerNode } from '@glyphscrape/types';
import type { ContainerKind, LayoutNode, ShapeKind } from '@glyphscrape/types';

const BBoxShape = {
  x0: z.number(),
  y0: z.number(),
  x1: z.number(),
  y1: z.number(),
};

type FixtureNode =
  | { kind: 'char'; text: string; x0: number; y0: number; x1: number; y1: number; fontName: string; fontSize: number }
  | { kind: 'anno'; text: string }
  | { kind: ShapeKind; x0: number; y0: number; x1: number; y1: number }
  | { kind: ContainerKind; x0: number; y0: number; x1: number; y1: number; children: FixtureNode[] };

const FixtureNodeSchema: z.ZodType<FixtureNode> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal('char'), text: z.string(), fontName: z.string(), fontSize: z.number(), ...BBoxShape }),
    z.object({ kind: z.literal('anno'), text: z.string() }),
    z.object({ kind: z.enum(['image', 'curve', 'line', 'rect']), ...BBoxShape }),
    z.object({
      kind: z.enum(['page', 'text-box', 'text-line', 'figure']),
      children: z.array(FixtureNodeSchema),
      ...BBoxShape,
    }),
  ])
);

function toLayoutNode(node: FixtureNode): LayoutNode {
  switch (node.kind) {
    case 'char':
      return char(node);
    case 'anno':
      return anno(node.text);
    case 'image':
    case 'curve':
    case 'line':
    case 'rect':
      return shape(node.kind, node);
    default:
      return new ContainerNode(node.kind, node, node.children.map(toLayoutNode));
  }
}

export function loadPage(name: string): ContainerNode {
  const raw: unknown = JSON.parse(readFileSync(new URL(`./${name}.json`, import.meta.url), 'utf-8'));
  const node = toLayoutNode(FixtureNodeSchema.parse(raw));
  if (!(node instanceof ContainerNode)) {
    throw new Error(`Fixture ${name} is not a container`);
  }
  return node;
}
