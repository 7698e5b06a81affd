/**
 * Node tree handed over by the page-layout decoder.
 * Coordinates are page units with the origin at the bottom-left corner.
 */

export interface BBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export type ContainerKind = 'page' | 'text-box' | 'text-line' | 'figure';
export type ShapeKind = 'image' | 'curve' | 'line' | 'rect';
export type NodeKind = ContainerKind | ShapeKind | 'char' | 'anno';

/** Kinds skipped by default when only text matters. */
export const DEFAULT_SKIP_KINDS: ReadonlySet<NodeKind> = new Set<NodeKind>([
  'curve',
  'figure',
  'image',
  'line',
  'rect',
]);

export class CharNode implements BBox {
  readonly kind = 'char';
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;
  readonly text: string;
  readonly fontName: string;
  readonly fontSize: number;

  constructor(init: BBox & { text: string; fontName: string; fontSize: number }) {
    this.x0 = init.x0;
    this.y0 = init.y0;
    this.x1 = init.x1;
    this.y1 = init.y1;
    this.text = init.text;
    this.fontName = init.fontName;
    this.fontSize = init.fontSize;
  }

  get width(): number {
    return this.x1 - this.x0;
  }

  get lowerText(): string {
    return this.text.toLowerCase();
  }
}

/** Word break (' ') or line end ('\n') inserted by the decoder; carries no geometry. */
export class AnnoNode {
  readonly kind = 'anno';

  constructor(readonly text: string) {}

  get lowerText(): string {
    return this.text.toLowerCase();
  }
}

export class ShapeNode implements BBox {
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;

  constructor(readonly kind: ShapeKind, bbox: BBox) {
    this.x0 = bbox.x0;
    this.y0 = bbox.y0;
    this.x1 = bbox.x1;
    this.y1 = bbox.y1;
  }

  get width(): number {
    return this.x1 - this.x0;
  }

  get lowerText(): string {
    return '';
  }
}

export class ContainerNode implements BBox {
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;

  private lowerTextValue = '';
  private lowerTextComputed = false;

  constructor(
    readonly kind: ContainerKind,
    bbox: BBox,
    readonly children: readonly LayoutNode[]
  ) {
    this.x0 = bbox.x0;
    this.y0 = bbox.y0;
    this.x1 = bbox.x1;
    this.y1 = bbox.y1;
  }

  get width(): number {
    return this.x1 - this.x0;
  }

  /**
   * Lowercased text of every text-bearing descendant, computed once.
   * Children are never mutated after construction.
   */
  get lowerText(): string {
    if (!this.lowerTextComputed) {
      this.lowerTextValue = this.children.map((child) => child.lowerText).join('');
      this.lowerTextComputed = true;
    }
    return this.lowerTextValue;
  }
}

export type LayoutNode = CharNode | AnnoNode | ShapeNode | ContainerNode;

export function isContainer(node: LayoutNode): node is ContainerNode {
  return node instanceof ContainerNode;
}

/** A page holding a single figure, as scanned documents do. */
export function isFigureOnlyPage(node: LayoutNode): boolean {
  return node.kind === 'page' && node.children.length === 1 && node.children[0]?.kind === 'figure';
}

export function hasBBox(node: LayoutNode): node is CharNode | ShapeNode | ContainerNode {
  return node.kind !== 'anno';
}

// Factories used by decoders and fixtures

export function page(bbox: BBox, children: LayoutNode[]): ContainerNode {
  return new ContainerNode('page', bbox, children);
}

export function textBox(bbox: BBox, children: LayoutNode[]): ContainerNode {
  return new ContainerNode('text-box', bbox, children);
}

export function textLine(bbox: BBox, children: LayoutNode[]): ContainerNode {
  return new ContainerNode('text-line', bbox, children);
}

export function figure(bbox: BBox, children: LayoutNode[] = []): ContainerNode {
  return new ContainerNode('figure', bbox, children);
}

export function char(init: BBox & { text: string; fontName: string; fontSize: number }): CharNode {
  return new CharNode(init);
}

export function anno(text: string): AnnoNode {
  return new AnnoNode(text);
}

export function shape(kind: ShapeKind, bbox: BBox): ShapeNode {
  return new ShapeNode(kind, bbox);
}
