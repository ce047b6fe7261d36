// =============================================================================
// TYPES
// =============================================================================

export type ScopeKind = "module" | "function" | "lambda" | "class" | "comprehension";

export type BindingKind = "name" | "import" | "function" | "class";

type Read = { name: string; seq: number };

export class Scope {
  readonly bindings = new Map<string, number>();
  readonly reads: Read[] = [];
  readonly globals = new Set<string>();
  readonly nonlocals = new Set<string>();
  readonly children: Scope[] = [];

  constructor(
    readonly kind: ScopeKind,
    readonly parent: Scope | null,
  ) {
    parent?.children.push(this);
  }
}

export type ModuleBindings = {
  // In first-binding order.
  definitions: string[];
  imports: Set<string>;
  functions: Set<string>;
  classes: Set<string>;
};

// =============================================================================
// SCOPE STACK
// =============================================================================

export class ScopeStack {
  readonly module = new Scope("module", null);
  private current: Scope = this.module;
  private seq = 0;
  private readonly bindingKinds = new Map<string, Set<BindingKind>>();

  push(kind: Exclude<ScopeKind, "module">): Scope {
    this.current = new Scope(kind, this.current);
    return this.current;
  }

  pop(): void {
    const parent = this.current.parent;
    if (!parent) {
      throw new Error("cannot pop the module scope");
    }
    this.current = parent;
  }

  read(name: string): void {
    this.seq += 1;
    this.current.reads.push({ name, seq: this.seq });
  }

  bind(name: string, kind: BindingKind = "name"): void {
    this.bindIn(this.current, name, kind);
  }

  // Assignment expressions bind in the nearest scope that is not a comprehension.
  bindWalrus(name: string): void {
    let target = this.current;
    while (target.kind === "comprehension" && target.parent) {
      target = target.parent;
    }
    this.bindIn(target, name, "name");
  }

  declareGlobal(name: string): void {
    if (this.current !== this.module) {
      this.current.globals.add(name);
    }
  }

  declareNonlocal(name: string): void {
    if (this.current !== this.module) {
      this.current.nonlocals.add(name);
    }
  }

  moduleBindings(): ModuleBindings {
    const definitions = [...this.module.bindings.entries()]
      .sort((a, b) => a[1] - b[1])
      .map(([name]) => name);

    const withKind = (kind: BindingKind): Set<string> =>
      new Set(definitions.filter((name) => this.bindingKinds.get(name)?.has(kind)));

    return {
      definitions,
      imports: withKind("import"),
      functions: withKind("function"),
      classes: withKind("class"),
    };
  }

  // Names read somewhere in the cell that no binding in the cell satisfies.
  externalReads(): Set<string> {
    const external = new Set<string>();
    const visit = (scope: Scope): void => {
      for (const read of scope.reads) {
        if (this.isExternal(scope, read)) external.add(read.name);
      }
      scope.children.forEach(visit);
    };
    visit(this.module);
    return external;
  }

  private bindIn(scope: Scope, name: string, kind: BindingKind): void {
    const target = scope.globals.has(name) ? this.module : scope;
    this.seq += 1;
    if (!target.bindings.has(name)) {
      target.bindings.set(name, this.seq);
    }
    if (target === this.module) {
      const kinds = this.bindingKinds.get(name) ?? new Set<BindingKind>();
      kinds.add(kind);
      this.bindingKinds.set(name, kinds);
    }
  }

  private isExternal(scope: Scope, read: Read): boolean {
    let deferred = false;
    let current: Scope = scope;

    while (current.kind !== "module") {
      if (current.kind === "function" || current.kind === "lambda") {
        deferred = true;
      }
      if (current.globals.has(read.name)) break;
      if (current.nonlocals.has(read.name)) return false;
      // Class bodies are not visible to the scopes nested inside them.
      const visible = current === scope || current.kind !== "class";
      if (visible && current.bindings.has(read.name)) return false;

      if (!current.parent) break;
      current = current.parent;
    }

    const boundAt = this.module.bindings.get(read.name);
    if (boundAt === undefined) return true;
    // A deferred body runs after the whole cell has bound its names.
    return deferred ? false : boundAt > read.seq;
  }
}
