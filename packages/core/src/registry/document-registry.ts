import type { DocumentIdentity } from '@kb-graph/types';
import { stripExtension } from '../identity/id-generator.js';

export class RegistrySealedError extends Error {
  constructor(documentPath: string) {
    super(`Registry is sealed; cannot register ${documentPath}`);
    this.name = 'RegistrySealedError';
  }
}

export class RegistryNotSealedError extends Error {
  constructor() {
    super('Registry must be sealed before lookups');
    this.name = 'RegistryNotSealedError';
  }
}

/**
 * Path → document URI lookup shared by one processing run.
 *
 * Two phases: every document is registered, then seal() is called and
 * the registry becomes read-only. Lookups are only allowed once sealed.
 */
export class DocumentRegistry {
  private byPath = new Map<string, DocumentIdentity>();
  private byStem = new Map<string, string>();
  private byBasename = new Map<string, string>();
  private sealed = false;

  register(identity: DocumentIdentity): void {
    if (this.sealed) {
      throw new RegistrySealedError(identity.path);
    }

    this.byPath.set(identity.path, identity);
    this.byStem.set(identity.pathWithoutExtension, identity.documentId);

    const slash = identity.pathWithoutExtension.lastIndexOf('/');
    if (slash >= 0) {
      this.byBasename.set(identity.pathWithoutExtension.slice(slash + 1), identity.documentId);
    }
  }

  /**
   * Exact path, then path without extension, then bare file stem
   */
  findByPath(pathOrStem: string): string | null {
    if (!this.sealed) {
      throw new RegistryNotSealedError();
    }

    const exact = this.byPath.get(pathOrStem);
    if (exact) {
      return exact.documentId;
    }

    const stem = stripExtension(pathOrStem);
    return this.byStem.get(pathOrStem) ?? this.byStem.get(stem) ?? this.byBasename.get(stem) ?? null;
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.byPath.size;
  }

  entries(): DocumentIdentity[] {
    return [...this.byPath.values()];
  }
}
