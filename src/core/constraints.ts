export type ConstraintType = 'prohibition' | 'requirement' | 'permission';
export type ConstraintSeverity = 'soft' | 'hard' | 'critical';

export interface Constraint {
  readonly id: string;
  readonly type: ConstraintType;
  readonly severity: ConstraintSeverity;
  readonly description: string;
  readonly promptInjection: string;
  readonly validationPatterns: readonly string[];
}

function create(
  type: ConstraintType,
  id: string,
  description: string,
  promptInjection: string,
  patterns: readonly string[] = [],
  severity: ConstraintSeverity = 'hard'
): Constraint {
  return Object.freeze({
    id,
    type,
    severity,
    description,
    promptInjection,
    validationPatterns: Object.freeze([...patterns]),
  });
}

export const Constraints = {
  prohibition(id: string, description: string, promptInjection: string, ...patterns: string[]): Constraint {
    return create('prohibition', id, description, promptInjection, patterns);
  },
  requirement(id: string, description: string, promptInjection: string): Constraint {
    return create('requirement', id, description, promptInjection);
  },
  permission(id: string, description: string, promptInjection: string): Constraint {
    return create('permission', id, description, promptInjection);
  },
  withSeverity(constraint: Constraint, severity: ConstraintSeverity): Constraint {
    return Object.freeze({ ...constraint, severity });
  },
};

export function formatConstraint(constraint: Constraint): string {
  return `[${constraint.type}:${constraint.severity}] ${constraint.description}`;
}

/**
 * Ordered set of constraints keyed by id. Adding an id that is already
 * present keeps the existing constraint.
 */
export class ConstraintSet {
  private readonly items: Constraint[] = [];

  constructor(constraints: Iterable<Constraint> = []) {
    for (const constraint of constraints) {
      this.add(constraint);
    }
  }

  add(constraint: Constraint): boolean {
    if (this.has(constraint.id)) return false;
    this.items.push(constraint);
    return true;
  }

  has(id: string): boolean {
    return this.items.some((item) => item.id === id);
  }

  get count(): number {
    return this.items.length;
  }

  get all(): readonly Constraint[] {
    return [...this.items];
  }

  get prohibitions(): readonly Constraint[] {
    return this.ofType('prohibition');
  }

  get requirements(): readonly Constraint[] {
    return this.ofType('requirement');
  }

  get permissions(): readonly Constraint[] {
    return this.ofType('permission');
  }

  // Union of both sets; on id collisions this set's constraint wins.
  merge(other?: ConstraintSet | null): ConstraintSet {
    const merged = new ConstraintSet(this.items);
    for (const constraint of other?.all ?? []) {
      merged.add(constraint);
    }
    return merged;
  }

  clone(): ConstraintSet {
    return new ConstraintSet(this.items);
  }

  private ofType(type: ConstraintType): readonly Constraint[] {
    return this.items.filter((item) => item.type === type);
  }
}
