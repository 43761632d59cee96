import { SubstitutionError } from '../types';

/**
 * Releases a substitution. Calling it more than once is a no-op.
 */
export interface SubstitutionHandle {
  readonly owner: string;
  restore(): void;
}

/**
 * A process-wide facility with a default implementation that tests may
 * replace. Only one substitute can be installed at a time.
 */
export class SubstitutionSlot<T> {
  private substitute: { value: T; owner: string } | null = null;

  constructor(
    private readonly name: string,
    private readonly fallback: () => T
  ) {}

  get(): T {
    return this.substitute ? this.substitute.value : this.fallback();
  }

  get isSubstituted(): boolean {
    return this.substitute !== null;
  }

  install(value: T, owner: string): SubstitutionHandle {
    if (this.substitute) {
      throw new SubstitutionError(
        `${this.name} is already substituted by ${this.substitute.owner}; stop it before installing ${owner}`
      );
    }
    const entry = { value, owner };
    this.substitute = entry;
    return {
      owner,
      restore: () => {
        if (this.substitute === entry) {
          this.substitute = null;
        }
      },
    };
  }
}
