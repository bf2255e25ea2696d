import { fingerprint } from "@tessera/lib";
import {
  getDeclaration,
  getExpression,
  getNode,
  getTypeInst,
  type HirFragment,
} from "../hir/graph.js";
import type { FileId, NodeId } from "../hir/ids.js";
import type { HirDeclaration, HirExpression, HirGenerator } from "../hir/nodes.js";
import { walkHir } from "../hir/walk.js";
import { isOverloadable, type GlobalScope } from "../scope/global-scope.js";
import { describeDeclKind, type FileScopes } from "../scope/lexical-scopes.js";
import { scopeIdKey } from "../scope/scope-arena.js";
import { declarationSummary, parameterSignature } from "../scope/signature.js";
import {
  bottomType,
  containsVar,
  errorType,
  formatTypeInst,
  isError,
  join,
  maxInst,
  maxOpt,
  primitive,
  typeInst,
  withInst,
  type TypeInst,
} from "./type-inst.js";
import type {
  CachedResolution,
  CandidateOutcome,
  DeclarationRef,
  Resolution,
  ResolutionCache,
  ResolutionDeps,
  ResolutionFailure,
  ResolutionStats,
} from "./types.js";
import {
  applySubstitution,
  compareScores,
  emptySubstitution,
  matchArguments,
  type MatchScore,
  type Substitution,
} from "./unify.js";

export interface ResolverEnvironment {
  fragmentOf(file: FileId): HirFragment | undefined;
  /** Signature fingerprint of any declaration in the workspace */
  signatureOf(declaration: NodeId): string | undefined;
}

export type FileResolution = {
  file: FileId;
  resolutions: ReadonlyMap<NodeId, Resolution>;
  /** Cache to hand to the next resolution of this file */
  cache: ResolutionCache;
  stats: ResolutionStats;
};

type Deps = {
  globals: Map<string, string>;
  declarations: Map<NodeId, string>;
};

type Typed = { type: TypeInst; deps: Deps };

const emptyDeps = (): Deps => ({ globals: new Map(), declarations: new Map() });

const mergeDeps = (target: Deps, source: ResolutionDeps): void => {
  source.globals.forEach((key, name) => target.globals.set(name, key));
  source.declarations.forEach((key, id) => target.declarations.set(id, key));
};

type CallExpression = Extract<HirExpression, { exprKind: "call" }>;

type Accepted = {
  ref: DeclarationRef;
  score: MatchScore;
  substitution: Substitution;
};

/**
 * State shared by the evaluators of one resolution pass: dependency
 * tracking, global lookups and declared types.
 */
class ResolutionSession {
  readonly global: GlobalScope;
  readonly environment: ResolverEnvironment;
  readonly entry: TypeEvaluator;
  readonly #previous: ResolutionCache;
  readonly cache = new Map<NodeId, CachedResolution>();
  readonly stats: ResolutionStats = { reused: 0, computed: 0 };
  readonly #stack: Deps[] = [];
  readonly #globalKeys = new Map<string, string>();
  readonly #declared = new Map<NodeId, Typed>();
  readonly #inProgress = new Set<NodeId>();
  readonly #expanding = new Set<NodeId>();
  readonly #evaluators = new Map<FileId, TypeEvaluator>();

  constructor({
    fragment,
    scopes,
    global,
    environment,
    previous,
  }: {
    fragment: HirFragment;
    scopes: FileScopes;
    global: GlobalScope;
    environment: ResolverEnvironment;
    previous: ResolutionCache;
  }) {
    this.global = global;
    this.environment = environment;
    this.#previous = previous;
    this.entry = new TypeEvaluator({ session: this, fragment, scopes });
    this.#evaluators.set(fragment.file, this.entry);
  }

  track<T>(compute: () => T): { value: T; deps: Deps } {
    const deps = emptyDeps();
    this.#stack.push(deps);
    let value: T;
    try {
      value = compute();
    } finally {
      this.#stack.pop();
    }
    this.addDeps(deps);
    return { value, deps };
  }

  addDeps(deps: ResolutionDeps): void {
    const top = this.#stack[this.#stack.length - 1];
    if (top) mergeDeps(top, deps);
  }

  globalKey(name: string): string {
    const known = this.#globalKeys.get(name);
    if (known !== undefined) return known;
    const bindings = this.global.bindings.get(name) ?? [];
    const key = fingerprint(
      bindings.flatMap((binding) => [
        binding.file,
        binding.declaration.id,
        this.environment.signatureOf(binding.declaration.id) ?? "",
      ])
    );
    this.#globalKeys.set(name, key);
    return key;
  }

  lookupGlobal(name: string): DeclarationRef[] {
    const key = this.globalKey(name);
    this.#stack[this.#stack.length - 1]?.globals.set(name, key);
    return [...(this.global.bindings.get(name) ?? [])];
  }

  consult(ref: DeclarationRef): void {
    const signature = this.environment.signatureOf(ref.declaration.id) ?? "";
    this.#stack[this.#stack.length - 1]?.declarations.set(ref.declaration.id, signature);
  }

  evaluatorFor(file: FileId): TypeEvaluator | undefined {
    const known = this.#evaluators.get(file);
    if (known) return known;
    const fragment = this.environment.fragmentOf(file);
    if (!fragment) return undefined;
    const evaluator = new TypeEvaluator({ session: this, fragment });
    this.#evaluators.set(file, evaluator);
    return evaluator;
  }

  /** Type of a declaration used as a value */
  declaredType(ref: DeclarationRef): TypeInst {
    const id = ref.declaration.id;
    const memo = this.#declared.get(id);
    if (memo) {
      this.addDeps(memo.deps);
      return memo.type;
    }
    if (this.#inProgress.has(id)) return errorType;

    this.#inProgress.add(id);
    let tracked: { value: TypeInst; deps: Deps };
    try {
      tracked = this.track(() => {
        this.consult(ref);
        return this.evaluatorFor(ref.file)?.declarationType(ref.declaration) ?? errorType;
      });
    } finally {
      this.#inProgress.delete(id);
    }
    this.#declared.set(id, { type: tracked.value, deps: tracked.deps });
    return tracked.value;
  }

  /** Normalized target of a type alias; the error type on a cycle */
  expandAlias(ref: DeclarationRef): TypeInst {
    const id = ref.declaration.id;
    const aliased = ref.declaration.aliased;
    const evaluator = this.evaluatorFor(ref.file);
    if (this.#expanding.has(id) || !evaluator || aliased === undefined) return errorType;

    this.#expanding.add(id);
    try {
      return evaluator.normalize(aliased);
    } finally {
      this.#expanding.delete(id);
    }
  }

  cached(node: NodeId, chain: string): CachedResolution | undefined {
    const entry = this.#previous.get(node);
    if (!entry || entry.chain !== chain) return undefined;
    for (const [name, key] of entry.deps.globals) {
      if (this.globalKey(name) !== key) return undefined;
    }
    for (const [id, signature] of entry.deps.declarations) {
      if (this.environment.signatureOf(id) !== signature) return undefined;
    }
    return entry;
  }
}

/**
 * Types the expressions of one fragment. The evaluator of the file being
 * resolved sees lexical scopes and records resolutions; evaluators of
 * other files only type their top-level signatures, through the global
 * scope.
 */
class TypeEvaluator {
  readonly #session: ResolutionSession;
  readonly #fragment: HirFragment;
  readonly #scopes?: FileScopes;
  readonly #types = new Map<NodeId, Typed>();
  readonly #chains = new Map<string, string>();
  readonly resolutions = new Map<NodeId, Resolution>();

  constructor({
    session,
    fragment,
    scopes,
  }: {
    session: ResolutionSession;
    fragment: HirFragment;
    scopes?: FileScopes;
  }) {
    this.#session = session;
    this.#fragment = fragment;
    this.#scopes = scopes;
  }

  get fragment(): HirFragment {
    return this.#fragment;
  }

  typeOf(id: NodeId): TypeInst {
    const memo = this.#types.get(id);
    if (memo) {
      this.#session.addDeps(memo.deps);
      return memo.type;
    }

    const expression = getExpression(this.#fragment, id);
    const isUse = expression.exprKind === "identifier" || expression.exprKind === "call";
    const chain = this.#scopes && isUse ? this.#chainKey(id) : undefined;
    if (chain !== undefined) {
      const hit = this.#session.cached(id, chain);
      if (hit) {
        this.#session.stats.reused += 1;
        this.#session.addDeps(hit.deps);
        this.resolutions.set(id, hit.resolution);
        this.#session.cache.set(id, hit);
        this.#types.set(id, {
          type: hit.type,
          deps: { globals: new Map(hit.deps.globals), declarations: new Map(hit.deps.declarations) },
        });
        return hit.type;
      }
    }

    const { value, deps } = this.#session.track(() => this.#compute(expression));
    this.#types.set(id, { type: value, deps });
    if (chain !== undefined) {
      this.#session.stats.computed += 1;
      const resolution = this.resolutions.get(id);
      if (resolution) {
        this.#session.cache.set(id, { resolution, type: value, deps, chain });
      }
    }
    return value;
  }

  /** Declared type of a declaration that lives in this evaluator's fragment */
  declarationType(declaration: HirDeclaration): TypeInst {
    switch (declaration.declKind) {
      case "enum":
        return typeInst({
          kind: "set",
          element: typeInst({ kind: "enum", name: declaration.name ?? "" }),
        });
      case "annotation":
        return primitive("ann");
      case "function":
      case "predicate":
      case "test":
      case "type-alias":
        return errorType;
      case "variable":
        if (declaration.typeInst !== undefined) return this.normalize(declaration.typeInst);
        return declaration.origin === "generator"
          ? this.#generatorVariableType(declaration)
          : errorType;
    }
  }

  /** HIR type-inst to the resolver's algebra; names and domains are resolved */
  normalize(id: NodeId): TypeInst {
    const node = getTypeInst(this.#fragment, id);
    const base = node.base;
    const wrap = (type: TypeInst): TypeInst => ({
      inst: maxInst(node.inst, type.inst),
      opt: maxOpt(node.opt, type.opt),
      base: type.base,
    });
    switch (base.kind) {
      case "primitive":
        return typeInst({ kind: base.name }, { inst: node.inst, opt: node.opt });
      case "type-var":
        return typeInst(
          base.enumVar ? { kind: "set-var", name: base.name } : { kind: "type-var", name: base.name },
          { inst: node.inst, opt: node.opt }
        );
      case "missing":
        return errorType;
      case "set":
        return typeInst(
          { kind: "set", element: withInst(this.normalize(base.element), "par") },
          { inst: node.inst, opt: node.opt }
        );
      case "tuple":
        return typeInst(
          { kind: "tuple", fields: base.fields.map((field) => this.normalize(field)) },
          { opt: node.opt }
        );
      case "array": {
        const element = this.normalize(base.element);
        return typeInst({
          kind: "array",
          dimensions: base.dimensions.map((dimension) => withInst(this.normalize(dimension), "par")),
          element: node.inst === "var" ? withInst(element, "var") : element,
        });
      }
      case "domain":
        return wrap(this.#domainType(base.expression));
    }
  }

  /** Element type named by a domain expression: `1..n`, `{1, 3}`, an enum or alias */
  #domainType(id: NodeId): TypeInst {
    const expression = getExpression(this.#fragment, id);
    if (expression.exprKind === "identifier") {
      const refs = this.#lookup(id, expression.name);
      const [only] = refs;
      if (refs.length === 1 && only?.declaration.declKind === "type-alias") {
        this.typeOf(id);
        this.#session.consult(only);
        return this.#session.expandAlias(only);
      }
    }

    const type = this.typeOf(id);
    return type.base.kind === "set" ? withInst(type.base.element, "par") : errorType;
  }

  #generatorOf(declaration: HirDeclaration): HirGenerator | undefined {
    const pattern = this.#fragment.parents.get(declaration.id);
    const owner = pattern === undefined ? undefined : this.#fragment.parents.get(pattern);
    if (pattern === undefined || owner === undefined) return undefined;
    const comprehension = getNode(this.#fragment, owner);
    if (comprehension.kind !== "expression" || comprehension.exprKind !== "comprehension") {
      return undefined;
    }
    return comprehension.generators.find((candidate) =>
      candidate.kind === "iterator"
        ? candidate.patterns.includes(pattern)
        : candidate.pattern === pattern
    );
  }

  #generatorVariableType(declaration: HirDeclaration): TypeInst {
    const generator = this.#generatorOf(declaration);
    if (!generator) return errorType;
    if (generator.kind === "assignment") return this.typeOf(generator.value);

    const collection = this.typeOf(generator.collection);
    switch (collection.base.kind) {
      case "set":
        return withInst(collection.base.element, collection.inst);
      case "array":
        return collection.base.element;
      default:
        return errorType;
    }
  }

  #chainKey(id: NodeId): string {
    const scopes = this.#scopes;
    const scope = scopes?.enclosing.get(id);
    if (!scopes || !scope) return "";
    const key = scopeIdKey(scope);
    const known = this.#chains.get(key);
    if (known !== undefined) return known;

    const parts = scopes.arena.chain(scope).flatMap((link) => {
      const info = scopes.arena.info(link);
      return [
        info.owner,
        ...scopes.arena.names(link).map(
          (name) =>
            `${name}=${scopes.arena.lookup(link, name).map((id) => this.#bindingKey(id)).join("|")}`
        ),
      ];
    });
    const chain = fingerprint(parts);
    this.#chains.set(key, chain);
    return chain;
  }

  /**
   * Generator variables take their type from the collection, which their
   * signature does not cover; the collection's content-derived id does.
   */
  #bindingKey(id: NodeId): string {
    const declaration = getDeclaration(this.#fragment, id);
    if (declaration.origin !== "generator") return `${id}`;
    const generator = this.#generatorOf(declaration);
    if (!generator) return `${id}`;
    return `${id}<${generator.kind === "iterator" ? generator.collection : generator.value}`;
  }

  #lookup(id: NodeId, name: string): DeclarationRef[] {
    const scopes = this.#scopes;
    const scope = scopes?.enclosing.get(id);
    if (scopes && scope) {
      for (const link of scopes.arena.chain(scope)) {
        const hits = scopes.arena.lookup(link, name);
        if (hits.length > 0) {
          return hits.map((hit) => ({
            file: this.#fragment.file,
            declaration: getDeclaration(this.#fragment, hit),
          }));
        }
      }
    }
    return this.#session.lookupGlobal(name);
  }

  #record(resolution: Resolution): void {
    if (this.#scopes) this.resolutions.set(resolution.node, resolution);
  }

  #compute(expression: HirExpression): TypeInst {
    switch (expression.exprKind) {
      case "literal":
        return primitive(expression.literal.type);
      case "absent":
        return typeInst({ kind: "bottom" }, { opt: "opt" });
      case "infinity":
        return primitive("int");
      case "anonymous":
        return bottomType;
      case "missing":
        return errorType;
      case "identifier":
        return this.#identifier(expression);
      case "call":
        return this.#call(expression);
      case "set-literal": {
        const members = expression.members.map((member) => this.typeOf(member));
        const element = members.reduce(join, bottomType);
        return typeInst(
          { kind: "set", element: withInst(element, "par") },
          { inst: members.some(containsVar) ? "var" : "par" }
        );
      }
      case "array-literal": {
        const element = expression.members.map((member) => this.typeOf(member)).reduce(join, bottomType);
        return typeInst({ kind: "array", dimensions: [primitive("int")], element });
      }
      case "array-literal-2d": {
        const element = expression.rows
          .flat()
          .map((member) => this.typeOf(member))
          .reduce(join, bottomType);
        return typeInst({
          kind: "array",
          dimensions: [primitive("int"), primitive("int")],
          element,
        });
      }
      case "tuple-literal":
        return typeInst({
          kind: "tuple",
          fields: expression.members.map((member) => this.typeOf(member)),
        });
      case "array-access": {
        const collection = this.typeOf(expression.collection);
        const indices = expression.indices.map((index) => this.typeOf(index));
        if (collection.base.kind !== "array") return errorType;
        const element = collection.base.element;
        return indices.some(containsVar) ? withInst(element, "var") : element;
      }
      case "tuple-access": {
        const tuple = this.typeOf(expression.tuple);
        if (tuple.base.kind !== "tuple") return errorType;
        return tuple.base.fields[expression.field - 1] ?? errorType;
      }
      case "comprehension":
        return this.#comprehension(expression);
      case "if-then-else": {
        const conditions = expression.branches.map((branch) => this.typeOf(branch.condition));
        const results = expression.branches.map((branch) => this.typeOf(branch.result));
        if (expression.otherwise !== undefined) results.push(this.typeOf(expression.otherwise));
        const joined = results.reduce(join, bottomType);
        return conditions.some(containsVar) ? withInst(joined, "var") : joined;
      }
      case "let":
        return this.typeOf(expression.body);
      case "string-interpolation":
        expression.parts.forEach((part) => {
          if ("expression" in part) this.typeOf(part.expression);
        });
        return primitive("string");
      case "annotated":
        return this.typeOf(expression.expression);
    }
  }

  #comprehension(
    expression: Extract<HirExpression, { exprKind: "comprehension" }>
  ): TypeInst {
    let varGenerators = false;
    let varWhere = false;
    expression.generators.forEach((generator) => {
      if (generator.kind === "iterator" && containsVar(this.typeOf(generator.collection))) {
        varGenerators = true;
      }
      if (generator.where !== undefined && containsVar(this.typeOf(generator.where))) {
        varWhere = true;
      }
    });
    const template = this.typeOf(expression.template);

    if (expression.comprehensionKind === "set") {
      return typeInst(
        { kind: "set", element: withInst(template, "par") },
        { inst: varGenerators || varWhere || containsVar(template) ? "var" : "par" }
      );
    }
    const element: TypeInst = varWhere
      ? { inst: "var", opt: "opt", base: template.base }
      : varGenerators
        ? withInst(template, "var")
        : template;
    return typeInst({ kind: "array", dimensions: [primitive("int")], element });
  }

  #identifier(expression: Extract<HirExpression, { exprKind: "identifier" }>): TypeInst {
    const refs = this.#lookup(expression.id, expression.name);
    const base = {
      node: expression.id,
      name: expression.name,
      kind: "identifier" as const,
      declarations: refs.map((ref) => ref.declaration.id),
      substitution: emptySubstitution,
      candidates: [],
    };

    const [only] = refs;
    if (refs.length === 0 || !only) {
      this.#record({
        ...base,
        failure: { code: "RS0001", params: { kind: "unknown-identifier", name: expression.name, callee: false } },
      });
      return errorType;
    }
    if (refs.length > 1) {
      this.#record({
        ...base,
        failure: {
          code: "RS0002",
          params: { kind: "ambiguous-reference", name: expression.name, count: refs.length },
        },
      });
      return errorType;
    }

    this.#record({ ...base, chosen: only.declaration.id });
    return this.#session.declaredType(only);
  }

  #call(call: CallExpression): TypeInst {
    const callee = getExpression(this.#fragment, call.callee);
    const args = call.args.map((arg) => this.typeOf(arg));
    if (callee.exprKind !== "identifier") return errorType;

    const name = callee.name;
    const refs = this.#lookup(call.id, name);
    const base = {
      node: call.id,
      name,
      kind: "call" as const,
      declarations: refs.map((ref) => ref.declaration.id),
    };
    const unresolved = (
      failure: ResolutionFailure | undefined,
      candidates: readonly CandidateOutcome[] = [],
      chosen?: NodeId
    ): TypeInst => {
      this.#record({ ...base, chosen, substitution: emptySubstitution, candidates, failure });
      return errorType;
    };

    if (refs.length === 0) {
      return unresolved({
        code: "RS0001",
        params: { kind: "unknown-identifier", name, callee: true },
      });
    }

    const callables = refs.filter((ref) => isOverloadable(ref.declaration));
    const [first] = refs;
    if (callables.length === 0 && first) {
      this.#session.consult(first);
      return unresolved(
        {
          code: "RS0005",
          params: { kind: "not-callable", name, declKind: describeDeclKind(first.declaration) },
        },
        [],
        first.declaration.id
      );
    }

    const argumentError = args.some(isError);
    const outcomes: CandidateOutcome[] = [];
    const accepted: Accepted[] = [];
    this.#collapseIdentical(callables).forEach((ref) => {
      this.#session.consult(ref);
      const fragment = this.#session.environment.fragmentOf(ref.file);
      const signature = fragment ? declarationSummary(fragment, ref.declaration) : name;
      const params = this.#parameterTypes(ref);
      const match = matchArguments(params, args);
      const outcome = { declaration: ref.declaration.id, file: ref.file, signature };
      if (match.ok) {
        outcomes.push({ ...outcome, accepted: true, score: match.score, substitution: match.substitution });
        accepted.push({ ref, score: match.score, substitution: match.substitution });
      } else {
        outcomes.push({ ...outcome, accepted: false, reason: match.reason });
      }
    });

    const argumentTypes = args.map(formatTypeInst).join(", ");
    if (accepted.length === 0) {
      return unresolved(
        argumentError
          ? undefined
          : { code: "RS0003", params: { kind: "no-overload", name, argumentTypes } },
        outcomes
      );
    }

    const best = accepted.reduce((winner, next) =>
      compareScores(next.score, winner.score) < 0 ? next : winner
    );
    const tied = accepted.filter((entry) => compareScores(entry.score, best.score) === 0);
    if (tied.length > 1) {
      return unresolved(
        argumentError
          ? undefined
          : {
              code: "RS0004",
              params: { kind: "ambiguous-overload", name, argumentTypes },
              tied: tied.map((entry) => entry.ref.declaration.id),
            },
        outcomes
      );
    }

    this.#record({
      ...base,
      chosen: best.ref.declaration.id,
      substitution: best.substitution,
      candidates: outcomes,
    });
    return this.#returnType(best, args);
  }

  /** Same-kind candidates with identical parameters count once, preferring a body */
  #collapseIdentical(callables: readonly DeclarationRef[]): DeclarationRef[] {
    const kept = new Map<string, DeclarationRef>();
    callables.forEach((ref) => {
      const fragment = this.#session.environment.fragmentOf(ref.file);
      const key = fragment
        ? `${ref.declaration.declKind}${parameterSignature(fragment, ref.declaration)}`
        : `${ref.declaration.id}`;
      const existing = kept.get(key);
      if (!existing || (existing.declaration.body === undefined && ref.declaration.body !== undefined)) {
        kept.set(key, ref);
      }
    });
    return [...kept.values()];
  }

  #parameterTypes(ref: DeclarationRef): TypeInst[] {
    const evaluator = this.#session.evaluatorFor(ref.file);
    if (!evaluator) return [];
    return ref.declaration.parameters.map((id) => {
      const parameter = getDeclaration(evaluator.fragment, id);
      return parameter.typeInst === undefined ? errorType : evaluator.normalize(parameter.typeInst);
    });
  }

  #returnType(best: Accepted, args: readonly TypeInst[]): TypeInst {
    const declaration = best.ref.declaration;
    switch (declaration.declKind) {
      case "predicate":
        return primitive("bool", args.some(containsVar) ? "var" : "par");
      case "test":
        return primitive("bool");
      case "annotation":
        return primitive("ann");
      default: {
        const evaluator = this.#session.evaluatorFor(best.ref.file);
        if (!evaluator || declaration.returnType === undefined) return errorType;
        return applySubstitution(evaluator.normalize(declaration.returnType), best.substitution);
      }
    }
  }
}

/**
 * Resolves every identifier use and call of a file against its lexical
 * scopes and the global scope of its include closure. Entries of
 * `previous` whose inputs are unchanged are reused as they are.
 */
export const resolveFile = ({
  fragment,
  scopes,
  global,
  environment,
  previous = new Map(),
}: {
  fragment: HirFragment;
  scopes: FileScopes;
  global: GlobalScope;
  environment: ResolverEnvironment;
  previous?: ResolutionCache;
}): FileResolution => {
  const session = new ResolutionSession({ fragment, scopes, global, environment, previous });
  const evaluator = session.entry;
  const order: NodeId[] = [];

  walkHir({
    fragment,
    enter: (node) => {
      if (node.kind !== "expression") return;
      if (node.exprKind === "identifier" && isCallee(fragment, node.id)) return;
      order.push(node.id);
      session.track(() => evaluator.typeOf(node.id));
    },
  });

  // Source order, whichever use happened to be typed first
  const resolutions = new Map<NodeId, Resolution>();
  order.forEach((id) => {
    const resolution = evaluator.resolutions.get(id);
    if (resolution) resolutions.set(id, resolution);
  });

  return {
    file: fragment.file,
    resolutions,
    cache: session.cache,
    stats: session.stats,
  };
};

const isCallee = (fragment: HirFragment, id: NodeId): boolean => {
  const parent = fragment.parents.get(id);
  if (parent === undefined) return false;
  const node = getNode(fragment, parent);
  return node.kind === "expression" && node.exprKind === "call" && node.callee === id;
};
