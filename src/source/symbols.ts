/**
 * Pure queries over a SymbolTable.
 */
import type { SymbolTable } from './types.js';

/**
 * Whether `derived` is `base` or reaches it by walking the supertype chain.
 * Unknown symbols have no supertypes; cycles are cut.
 */
export function isSameOrDescendant(
  symbols: SymbolTable,
  derived: string,
  base: string
): boolean {
  const visited = new Set<string>();
  const queue = [derived];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || visited.has(current)) continue;
    if (current === base) return true;
    visited.add(current);
    queue.push(...(symbols.get(current) ?? []));
  }

  return false;
}

/**
 * Ancestors of a symbol in breadth-first order, excluding the symbol itself.
 */
export function supertypeChain(symbols: SymbolTable, symbol: string): string[] {
  const chain: string[] = [];
  const visited = new Set<string>([symbol]);
  const queue = [...(symbols.get(symbol) ?? [])];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || visited.has(current)) continue;
    visited.add(current);
    chain.push(current);
    queue.push(...(symbols.get(current) ?? []));
  }

  return chain;
}
