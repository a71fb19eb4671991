/**
 * Sheet Hierarchy
 *
 * A sheet owns its children; the link back to the parent is a WeakRef so the
 * tree has no ownership cycle. Ancestry is always read by collecting the
 * ancestor path, never by walking and mutating parent pointers.
 */

import { StructuralError } from '../../utils/errors.js';
import type { SheetMetadata } from '../../types/index.js';

export class SheetNode {
  public readonly name: string;
  public readonly children: SheetNode[] = [];
  public readonly componentRefs: string[];
  public readonly localNets = new Set<string>();
  public readonly sharedNets = new Set<string>();

  private parentRef: WeakRef<SheetNode> | null = null;

  constructor(name: string, componentRefs: string[] = []) {
    this.name = name;
    this.componentRefs = [...componentRefs];
  }

  get parent(): SheetNode | undefined {
    return this.parentRef?.deref();
  }

  addChild(child: SheetNode): void {
    if (child.parentRef) {
      throw new StructuralError(
        `Sheet ${child.name} already has a parent`,
        [child.name],
        { operation: 'addChild' }
      );
    }
    if (this.ancestorPath().includes(child)) {
      throw new StructuralError(
        `Adding ${child.name} under ${this.name} would create a cycle`,
        [child.name, this.name],
        { operation: 'addChild' }
      );
    }
    child.parentRef = new WeakRef(this);
    this.children.push(child);
  }

  /** Root first, this node last. */
  ancestorPath(): SheetNode[] {
    const path: SheetNode[] = [];
    let node: SheetNode | undefined = this;
    while (node) {
      path.unshift(node);
      node = node.parent;
    }
    return path;
  }

  get root(): SheetNode {
    return this.ancestorPath()[0];
  }

  get path(): string {
    const names = this.ancestorPath().slice(1).map((n) => n.name);
    return `/${names.join('/')}`;
  }

  /** Pre-order, this node first. */
  descendants(): SheetNode[] {
    const nodes: SheetNode[] = [this];
    for (const child of this.children) {
      nodes.push(...child.descendants());
    }
    return nodes;
  }

  isAncestorOf(other: SheetNode): boolean {
    return other.ancestorPath().includes(this);
  }
}

export interface SheetForest {
  roots: SheetNode[];
  nodes: Map<string, SheetNode>;
  /** Sheets left out of the forest, mapped to the error that excluded them. */
  detached: Map<string, StructuralError>;
  errors: StructuralError[];
}

interface BrokenLink {
  message: string;
  sheets: string[];
}

/**
 * Builds sheet trees from flat hierarchy metadata. A sheet whose parent chain
 * ends in an unknown parent or loops back on itself is excluded along with
 * every sheet below it; the rest of the project is unaffected.
 */
export function buildSheetForest(sheets: SheetMetadata[]): SheetForest {
  const parentOf = new Map(sheets.map((s) => [s.sheetName, s.parentSheetName]));
  const verdict = new Map<string, BrokenLink | null>();
  const links: BrokenLink[] = [];

  for (const sheet of sheets) {
    const chain: string[] = [];
    let current = sheet.sheetName;
    let result: BrokenLink | null;

    for (;;) {
      const known = verdict.get(current);
      if (known !== undefined) {
        result = known;
        break;
      }
      const seenAt = chain.indexOf(current);
      if (seenAt >= 0) {
        const cycle = chain.slice(seenAt);
        result = {
          message: `Cyclic sheet reference: ${[...cycle, current].join(' -> ')}`,
          sheets: cycle,
        };
        links.push(result);
        break;
      }
      chain.push(current);

      const parent = parentOf.get(current) ?? null;
      if (parent === null) {
        result = null;
        break;
      }
      if (!parentOf.has(parent)) {
        result = { message: `Sheet ${current} references unknown parent ${parent}`, sheets: [current] };
        links.push(result);
        break;
      }
      current = parent;
    }

    for (const name of chain) {
      verdict.set(name, result);
    }
  }

  const affected = new Map<BrokenLink, string[]>(links.map((link) => [link, []]));
  for (const sheet of sheets) {
    const link = verdict.get(sheet.sheetName);
    if (link) affected.get(link)?.push(sheet.sheetName);
  }

  const errors = links.map(
    (link) => new StructuralError(link.message, affected.get(link) ?? link.sheets, { operation: 'buildSheetForest' })
  );
  const errorFor = new Map(links.map((link, i) => [link, errors[i]]));

  const nodes = new Map<string, SheetNode>();
  const detached = new Map<string, StructuralError>();
  for (const sheet of sheets) {
    const link = verdict.get(sheet.sheetName);
    const error = link ? errorFor.get(link) : undefined;
    if (error) {
      detached.set(sheet.sheetName, error);
    } else {
      nodes.set(sheet.sheetName, new SheetNode(sheet.sheetName, sheet.childComponentRefs));
    }
  }

  const roots: SheetNode[] = [];
  for (const sheet of sheets) {
    const node = nodes.get(sheet.sheetName);
    if (!node) continue;
    const parent = sheet.parentSheetName === null ? undefined : nodes.get(sheet.parentSheetName);
    if (parent) {
      parent.addChild(node);
    } else {
      roots.push(node);
    }
  }

  return { roots, nodes, detached, errors };
}
