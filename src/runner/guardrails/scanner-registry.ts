import { BUILT_IN_SCANNERS } from './scanners.ts';
import type { Scanner } from './types.ts';

export class ScannerRegistry {
  private readonly scanners = new Map<string, Scanner>();

  register(scanner: Scanner): this {
    if (this.scanners.has(scanner.name)) {
      throw new Error(`Guardrail scanner "${scanner.name}" is already registered`);
    }
    this.scanners.set(scanner.name, scanner);
    return this;
  }

  get(name: string): Scanner | undefined {
    return this.scanners.get(name);
  }

  has(name: string): boolean {
    return this.scanners.has(name);
  }

  list(): Scanner[] {
    return [...this.scanners.values()].sort((a, b) => a.name.localeCompare(b.name));
  }
}

export function createDefaultScannerRegistry(): ScannerRegistry {
  const registry = new ScannerRegistry();
  for (const scanner of BUILT_IN_SCANNERS) registry.register(scanner);
  return registry;
}
