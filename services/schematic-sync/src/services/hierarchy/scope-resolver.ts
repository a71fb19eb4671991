/**
 * Hierarchical Scope Resolver
 *
 * Decides where each net must be declared. A net used on one sheet stays
 * local to it. A net used on several sheets is declared ("shared") at their
 * lowest common ancestor and passed as a hierarchical port through every
 * sheet strictly between that ancestor and each sheet using it.
 */

import { StructuralError } from '../../utils/errors.js';
import type { SheetNode } from './sheet-node.js';

export interface NetScopeResolution {
  shared: Map<SheetNode, Set<string>>;
  passThrough: Map<SheetNode, Set<string>>;
  local: Map<SheetNode, Set<string>>;
  /** Net name to the sheet that declares it. */
  declaredAt: Map<string, SheetNode>;
}

export function lowestCommonAncestor(sheets: SheetNode[]): SheetNode {
  if (sheets.length === 0) {
    throw new StructuralError('Cannot take the common ancestor of no sheets', [], {
      operation: 'lowestCommonAncestor',
    });
  }

  const paths = sheets.map((sheet) => sheet.ancestorPath());
  const shortest = Math.min(...paths.map((p) => p.length));
  let common: SheetNode | null = null;

  for (let depth = 0; depth < shortest; depth++) {
    const candidate = paths[0][depth];
    if (!paths.every((path) => path[depth] === candidate)) break;
    common = candidate;
  }

  if (!common) {
    throw new StructuralError(
      `Sheets ${sheets.map((s) => s.name).join(', ')} have no common ancestor`,
      sheets.map((s) => s.name),
      { operation: 'lowestCommonAncestor' }
    );
  }
  return common;
}

export function resolveNetScopes(
  tree: SheetNode,
  declaredNets: Map<SheetNode, Set<string>>
): NetScopeResolution {
  const nodes = tree.descendants();
  const shared = new Map(nodes.map((n) => [n, new Set<string>()]));
  const passThrough = new Map(nodes.map((n) => [n, new Set<string>()]));
  const local = new Map(nodes.map((n) => [n, new Set<string>()]));
  const declaredAt = new Map<string, SheetNode>();

  const users = new Map<string, SheetNode[]>();
  for (const [sheet, nets] of declaredNets) {
    for (const net of nets) {
      const list = users.get(net);
      if (list) {
        if (!list.includes(sheet)) list.push(sheet);
      } else {
        users.set(net, [sheet]);
      }
    }
  }

  for (const [net, sheets] of users) {
    const outside = sheets.filter((sheet) => !tree.isAncestorOf(sheet));
    if (outside.length > 0) {
      const names = sheets.map((s) => s.name);
      throw new StructuralError(
        `Net ${net} is referenced in sheets with no common ancestor: ${names.join(', ')}`,
        names,
        { operation: 'resolveScopes', net }
      );
    }

    if (sheets.length === 1) {
      local.get(sheets[0])?.add(net);
      declaredAt.set(net, sheets[0]);
      continue;
    }

    const lca = lowestCommonAncestor(sheets);
    shared.get(lca)?.add(net);
    declaredAt.set(net, lca);

    for (const sheet of sheets) {
      if (sheet === lca) continue;
      let node = sheet.parent;
      while (node && node !== lca) {
        passThrough.get(node)?.add(net);
        node = node.parent;
      }
    }
  }

  return { shared, passThrough, local, declaredAt };
}

export function resolveScopes(
  tree: SheetNode,
  declaredNets: Map<SheetNode, Set<string>>
): Map<SheetNode, Set<string>> {
  return resolveNetScopes(tree, declaredNets).shared;
}
