import {
  branch,
  ConstTable,
  createTypeArena,
  floatToBits,
  leaf,
  ProgramItems,
  scalarSize,
  TypeckTable,
  valTreeFromBytes,
  variantOfRes,
  type BindingAnnotation,
  type ConstBody,
  type ConstValue,
  type CtorKind,
  type DefId,
  type FieldDef,
  type HirExpr,
  type HirPattern,
  type HirPatField,
  type HirQPath,
  type RangeEnd,
  type Res,
  type SourceSpan,
  type TypeArena,
  type TypeId,
  type ValTree,
} from "@patlower/compiler";
import { FixtureError } from "./errors.js";
import { parseType } from "./type-parser.js";

type JsonRecord = Record<string, unknown>;

export type LoweringFixture = {
  file: string;
  arena: TypeArena;
  items: ProgramItems;
  typeck: TypeckTable;
  consts: ConstTable;
  genericArgs: TypeId[];
  arms: HirPattern[];
};

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const expectRecord = (value: unknown, path: string): JsonRecord => {
  if (!isRecord(value)) {
    throw new FixtureError(`expected an object at ${path}`);
  }
  return value;
};

const readOptionalString = (record: JsonRecord, key: string, path: string): string | undefined => {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new FixtureError(`expected ${path}.${key} to be a string`);
  }
  return value;
};

const readString = (record: JsonRecord, key: string, path: string): string => {
  const value = readOptionalString(record, key, path);
  if (value === undefined) {
    throw new FixtureError(`missing ${path}.${key}`);
  }
  return value;
};

const readBoolean = (record: JsonRecord, key: string, path: string): boolean | undefined => {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new FixtureError(`expected ${path}.${key} to be a boolean`);
  }
  return value;
};

const readOptionalNumber = (record: JsonRecord, key: string, path: string): number | undefined => {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new FixtureError(`expected ${path}.${key} to be an integer`);
  }
  return value;
};

const readArray = (record: JsonRecord, key: string, path: string): unknown[] => {
  const value = record[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new FixtureError(`expected ${path}.${key} to be an array`);
  }
  return value;
};

const readStrings = (record: JsonRecord, key: string, path: string): string[] =>
  readArray(record, key, path).map((entry, index) => {
    if (typeof entry !== "string") {
      throw new FixtureError(`expected ${path}.${key}[${index}] to be a string`);
    }
    return entry;
  });

const toBigInt = (value: unknown, path: string): bigint => {
  if (typeof value === "number" && Number.isInteger(value)) {
    return BigInt(value);
  }
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
    return BigInt(value.trim());
  }
  throw new FixtureError(`expected an integer at ${path}`);
};

const ctorKindOf = (value: string | undefined, path: string): CtorKind => {
  switch (value) {
    case undefined:
    case "none":
      return "none";
    case "fn":
    case "const":
      return value;
    default:
      throw new FixtureError(`unknown constructor kind "${value}" at ${path}`);
  }
};

const rangeEndOf = (value: string | undefined, path: string): RangeEnd => {
  switch (value) {
    case "included":
    case "excluded":
      return value;
    case undefined:
      throw new FixtureError(`missing ${path}.end`);
    default:
      throw new FixtureError(`unknown range end "${value}" at ${path}`);
  }
};

const bindingAnnotationOf = (value: string | undefined, path: string): BindingAnnotation => {
  switch (value) {
    case undefined:
    case "value":
      return { kind: "by-value", mutable: false };
    case "mut":
      return { kind: "by-value", mutable: true };
    case "ref":
      return { kind: "by-ref", mutable: false };
    case "ref-mut":
      return { kind: "by-ref", mutable: true };
    default:
      throw new FixtureError(`unknown binding mode "${value}" at ${path}`);
  }
};

const textEncoder = new TextEncoder();

class FixtureDecoder {
  readonly arena = createTypeArena();
  readonly items = new ProgramItems(this.arena);
  readonly typeck = new TypeckTable();
  readonly #file: string;
  readonly #adts = new Map<string, DefId>();
  readonly #paths = new Map<string, Res>();
  #params: readonly string[] = [];
  #nextHirId = 0;

  constructor(file: string) {
    this.#file = file;
  }

  decode(root: JsonRecord): LoweringFixture {
    this.#params = readStrings(root, "params", "fixture");
    readArray(root, "adts", "fixture").forEach((entry, index) =>
      this.#declareAdt(expectRecord(entry, `adts[${index}]`), `adts[${index}]`)
    );
    this.#declareAliases(root.aliases);
    readArray(root, "consts", "fixture").forEach((entry, index) =>
      this.#declareConst(expectRecord(entry, `consts[${index}]`), `consts[${index}]`)
    );
    readArray(root, "assocConsts", "fixture").forEach((entry, index) =>
      this.#declareAssocConst(
        expectRecord(entry, `assocConsts[${index}]`),
        `assocConsts[${index}]`
      )
    );
    readStrings(root, "statics", "fixture").forEach((name) =>
      this.#paths.set(name, {
        kind: "def",
        defKind: "static",
        def: this.items.declareStatic(name),
      })
    );
    readStrings(root, "constParams", "fixture").forEach((name) =>
      this.#paths.set(name, {
        kind: "def",
        defKind: "const-param",
        def: this.items.declareConstParam(name),
      })
    );
    readStrings(root, "functions", "fixture").forEach((name) =>
      this.#paths.set(name, { kind: "def", defKind: "fn", def: this.items.declareFn(name) })
    );

    const genericArgs = readStrings(root, "genericArgs", "fixture").map((type) =>
      this.#type(type)
    );
    const arms = readArray(root, "arms", "fixture").map((entry, index) =>
      this.#pattern(entry, `arms[${index}]`)
    );

    return {
      file: this.#file,
      arena: this.arena,
      items: this.items,
      typeck: this.typeck,
      consts: new ConstTable(this.items),
      genericArgs,
      arms,
    };
  }

  #type(source: string, params: readonly string[] = this.#params): TypeId {
    return parseType(source, { arena: this.arena, adts: this.#adts, params });
  }

  #span(record: JsonRecord, path: string): SourceSpan {
    const span = readArray(record, "span", path);
    const [start, end] = span;
    if (span.length === 0) {
      return { file: this.#file, start: 0, end: 0 };
    }
    if (typeof start !== "number" || typeof end !== "number" || span.length !== 2) {
      throw new FixtureError(`expected ${path}.span to be [start, end]`);
    }
    return { file: this.#file, start, end };
  }

  #declareAdt(record: JsonRecord, path: string): void {
    const name = readString(record, "name", path);
    const kind = readString(record, "kind", path);
    if (kind !== "enum" && kind !== "struct" && kind !== "union") {
      throw new FixtureError(`unknown ADT kind "${kind}" at ${path}`);
    }
    const generics = readStrings(record, "generics", path);
    const fieldsOf = (entry: JsonRecord, entryPath: string): FieldDef[] =>
      readArray(entry, "fields", entryPath).map((field, index) => {
        const fieldRecord = expectRecord(field, `${entryPath}.fields[${index}]`);
        return {
          name: readOptionalString(fieldRecord, "name", entryPath) ?? String(index),
          type: this.#type(readString(fieldRecord, "type", entryPath), generics),
        };
      });

    const variants =
      kind === "enum"
        ? readArray(record, "variants", path).map((entry, index) => {
            const variantPath = `${path}.variants[${index}]`;
            const variant = expectRecord(entry, variantPath);
            return {
              name: readString(variant, "name", variantPath),
              ctorKind: ctorKindOf(readOptionalString(variant, "ctor", variantPath), variantPath),
              fields: fieldsOf(variant, variantPath),
            };
          })
        : [
            {
              name,
              ctorKind: ctorKindOf(readOptionalString(record, "ctor", path), path),
              fields: fieldsOf(record, path),
            },
          ];

    const adt = this.items.declareAdt({
      name,
      kind,
      generics,
      isBox: readBoolean(record, "box", path) ?? false,
      variants,
    });
    this.#adts.set(name, adt.def);

    if (kind !== "enum") {
      const ctor = adt.variants[0]?.ctor;
      this.#paths.set(
        name,
        ctor !== undefined
          ? { kind: "def", defKind: "ctor-struct", def: ctor }
          : { kind: "def", defKind: kind, def: adt.def }
      );
      return;
    }
    adt.variants.forEach((variant) =>
      this.#paths.set(
        `${name}::${variant.name}`,
        variant.ctor !== undefined
          ? { kind: "def", defKind: "ctor-variant", def: variant.ctor }
          : { kind: "def", defKind: "variant", def: variant.def }
      )
    );
  }

  #declareAliases(raw: unknown): void {
    if (raw === undefined) return;
    const aliases = expectRecord(raw, "aliases");
    Object.entries(aliases).forEach(([alias, target]) => {
      const adt = typeof target === "string" ? this.#adts.get(target) : undefined;
      if (adt === undefined) {
        throw new FixtureError(`alias ${alias} must name a declared ADT`);
      }
      this.#adts.set(alias, adt);
      this.#paths.set(alias, {
        kind: "def",
        defKind: "ty-alias",
        def: this.items.declareTypeAlias(alias),
      });
    });
  }

  #declareConst(record: JsonRecord, path: string): void {
    const name = readString(record, "name", path);
    const type = this.#type(readString(record, "type", path));
    const def = this.items.declareConst({
      name,
      type,
      body: this.#constBody(record, type, path),
      genericDependent: readBoolean(record, "genericDependent", path),
    });
    this.#paths.set(name, { kind: "def", defKind: "const", def });
  }

  #declareAssocConst(record: JsonRecord, path: string): void {
    const name = readString(record, "name", path);
    const type = this.#type(readString(record, "type", path));
    const def = this.items.declareAssocConst({
      name,
      type,
      body: this.#constBody(record, type, path),
    });
    readArray(record, "impls", path).forEach((entry, index) => {
      const implPath = `${path}.impls[${index}]`;
      const impl = expectRecord(entry, implPath);
      this.items.declareImplConst(def, this.#type(readString(impl, "self", implPath)), {
        type,
        body: this.#constBody(impl, type, implPath),
      });
    });
    this.#paths.set(name, { kind: "def", defKind: "assoc-const", def });
  }

  #constBody(record: JsonRecord, type: TypeId, path: string): ConstBody | undefined {
    const reason = readOptionalString(record, "fails", path);
    if (reason !== undefined) {
      return { kind: "fails", reason };
    }
    if (record.opaque !== undefined) {
      return { kind: "opaque", value: this.#constValue(record.opaque, type, `${path}.opaque`) };
    }
    if (record.value !== undefined) {
      return { kind: "valtree", valtree: this.#valtree(record.value, type, `${path}.value`) };
    }
    return undefined;
  }

  #constValue(raw: unknown, type: TypeId, path: string): ConstValue {
    const valtree = this.#valtree(raw, type, path);
    if (valtree.kind === "leaf") {
      return { kind: "scalar", scalar: valtree.scalar };
    }
    if (typeof raw === "string") {
      return { kind: "slice", bytes: Array.from(textEncoder.encode(raw)) };
    }
    throw new FixtureError(`opaque constants must be scalars or strings at ${path}`);
  }

  #valtree(raw: unknown, type: TypeId, path: string): ValTree {
    const desc = this.arena.get(type);
    const size = scalarSize(desc);
    const elements = (types: (index: number) => TypeId): ValTree[] => {
      if (!Array.isArray(raw)) {
        throw new FixtureError(`expected an array at ${path}`);
      }
      return raw.map((entry, index) => this.#valtree(entry, types(index), `${path}[${index}]`));
    };

    switch (desc.kind) {
      case "int":
      case "uint":
        return leaf(toBigInt(raw, path), size ?? 16);
      case "float": {
        const value = typeof raw === "string" ? Number(raw) : raw;
        if (typeof value !== "number") {
          throw new FixtureError(`expected a number at ${path}`);
        }
        return leaf(floatToBits(value, size ?? 8), size ?? 8);
      }
      case "bool":
        if (typeof raw !== "boolean") {
          throw new FixtureError(`expected a boolean at ${path}`);
        }
        return leaf(raw ? 1n : 0n, 1);
      case "char": {
        const codePoint = typeof raw === "string" ? raw.codePointAt(0) : undefined;
        if (codePoint === undefined) {
          throw new FixtureError(`expected a character at ${path}`);
        }
        return leaf(BigInt(codePoint), 4);
      }
      case "ref":
        if (this.arena.get(desc.referent).kind === "str") {
          if (typeof raw !== "string") {
            throw new FixtureError(`expected a string at ${path}`);
          }
          return valTreeFromBytes(Array.from(textEncoder.encode(raw)));
        }
        return this.#valtree(raw, desc.referent, path);
      case "tuple": {
        const children = elements((index) => {
          const element = desc.elements[index];
          if (element === undefined) {
            throw new FixtureError(`too many tuple elements at ${path}`);
          }
          return element;
        });
        if (children.length !== desc.elements.length) {
          throw new FixtureError(`expected ${desc.elements.length} tuple elements at ${path}`);
        }
        return branch(children);
      }
      case "array":
      case "slice":
        return branch(elements(() => desc.element));
      case "adt": {
        const record = expectRecord(raw, path);
        const adt = this.items.adtDef(desc.adt);
        const variantName = readOptionalString(record, "variant", path);
        const variantIndex =
          adt.kind === "enum"
            ? adt.variants.findIndex((variant) => variant.name === variantName)
            : 0;
        const variant = adt.variants[variantIndex];
        if (!variant) {
          throw new FixtureError(`unknown variant "${variantName}" of ${adt.name} at ${path}`);
        }
        const fields = readArray(record, "fields", path);
        if (fields.length !== variant.fields.length) {
          throw new FixtureError(
            `expected ${variant.fields.length} fields for ${variant.name} at ${path}`
          );
        }
        const children = fields.map((field, index) => {
          const fieldDef = variant.fields[index];
          if (!fieldDef) {
            throw new FixtureError(`unknown field ${index} at ${path}`);
          }
          return this.#valtree(
            field,
            this.arena.substitute(fieldDef.type, desc.args),
            `${path}.fields[${index}]`
          );
        });
        return adt.kind === "enum"
          ? branch([leaf(BigInt(variantIndex), 4), ...children])
          : branch(children);
      }
      default:
        throw new FixtureError(`cannot build a constant of this type at ${path}`);
    }
  }

  /**
   * `A::B` paths resolve by name. `<Type>::NAME` stays type-relative; when
   * NAME is an associated constant the typing results resolve it, with `Type`
   * as the instance argument unless the node lists its own `args`.
   */
  #qpath(source: string, hirId: number): HirQPath {
    const typeRelative = /^<(.+)>::(\w+)$/.exec(source);
    if (!typeRelative) {
      return {
        kind: "resolved",
        segments: source.split("::"),
        res: this.#paths.get(source) ?? { kind: "err" },
      };
    }
    const [, selfType = "", segment = ""] = typeRelative;
    const res = this.#paths.get(segment);
    if (res?.kind === "def" && res.defKind === "assoc-const") {
      this.typeck.recordTypeDependentDef(hirId, res);
      if (this.typeck.nodeArgs(hirId).length === 0) {
        this.typeck.recordNodeArgs(hirId, [this.#type(selfType)]);
      }
    }
    return { kind: "type-relative", selfType, segment };
  }

  #annotate(hirId: number, record: JsonRecord, type: TypeId, path: string): void {
    this.typeck.recordType(hirId, type);
    const adjustments = readStrings(record, "adjustments", path).map((entry) =>
      this.#type(entry)
    );
    if (adjustments.length > 0) {
      this.typeck.recordAdjustments(hirId, adjustments);
    }
    const userType = readOptionalString(record, "userType", path);
    if (userType !== undefined) {
      this.typeck.recordUserType(hirId, { kind: "ty", type: this.#type(userType) });
    }
    const args = readStrings(record, "args", path);
    if (args.length > 0) {
      this.typeck.recordNodeArgs(
        hirId,
        args.map((entry) => this.#type(entry))
      );
    }
  }

  #expr(raw: unknown, type: TypeId, span: SourceSpan, path: string): HirExpr {
    const hirId = this.#nextHirId++;
    this.typeck.recordType(hirId, type);
    const literal = (value: HirExpr & { exprKind: "literal" }): HirExpr => value;

    if (typeof raw === "number" && Number.isInteger(raw)) {
      return raw < 0
        ? {
            hirId,
            span,
            exprKind: "unary",
            op: "neg",
            operand: this.#expr(-raw, type, span, path),
          }
        : literal({
            hirId,
            span,
            exprKind: "literal",
            literal: { span, litKind: "int", value: BigInt(raw) },
          });
    }
    if (typeof raw === "boolean") {
      return literal({
        hirId,
        span,
        exprKind: "literal",
        literal: { span, litKind: "bool", value: raw },
      });
    }

    const record = expectRecord(raw, path);
    this.#annotate(hirId, record, type, path);
    if (record.neg !== undefined) {
      return {
        hirId,
        span,
        exprKind: "unary",
        op: "neg",
        operand: this.#expr(record.neg, type, span, `${path}.neg`),
      };
    }
    if (record.int !== undefined) {
      return literal({
        hirId,
        span,
        exprKind: "literal",
        literal: { span, litKind: "int", value: toBigInt(record.int, `${path}.int`) },
      });
    }
    const pathName = readOptionalString(record, "path", path);
    if (pathName !== undefined) {
      return { hirId, span, exprKind: "path", qpath: this.#qpath(pathName, hirId) };
    }
    if (record.const !== undefined) {
      return this.#inlineConst(hirId, expectRecord(record.const, `${path}.const`), type, span, path);
    }

    const float = readOptionalString(record, "float", path);
    if (float !== undefined) {
      return literal({ hirId, span, exprKind: "literal", literal: { span, litKind: "float", text: float } });
    }
    const char = readOptionalString(record, "char", path);
    if (char !== undefined) {
      return literal({ hirId, span, exprKind: "literal", literal: { span, litKind: "char", value: char } });
    }
    const str = readOptionalString(record, "str", path);
    if (str !== undefined) {
      return literal({ hirId, span, exprKind: "literal", literal: { span, litKind: "str", value: str } });
    }
    const byte = readOptionalNumber(record, "byte", path);
    if (byte !== undefined) {
      return literal({ hirId, span, exprKind: "literal", literal: { span, litKind: "byte", value: byte } });
    }
    const bool = readBoolean(record, "bool", path);
    if (bool !== undefined) {
      return literal({ hirId, span, exprKind: "literal", literal: { span, litKind: "bool", value: bool } });
    }
    throw new FixtureError(`unrecognized expression at ${path}`);
  }

  #inlineConst(
    hirId: number,
    record: JsonRecord,
    type: TypeId,
    span: SourceSpan,
    path: string
  ): HirExpr {
    const def = this.items.declareInlineConst({
      type,
      body: this.#constBody(record, type, `${path}.const`),
      genericDependent: readBoolean(record, "genericDependent", path),
    });
    const blockHirId = this.#nextHirId++;
    const body: HirExpr =
      record.body !== undefined
        ? this.#expr(record.body, type, span, `${path}.const.body`)
        : {
            hirId: this.#nextHirId++,
            span,
            exprKind: "path",
            qpath: { kind: "resolved", segments: ["{const body}"], res: { kind: "err" } },
          };
    return { hirId, span, exprKind: "const-block", block: { hirId: blockHirId, def, body } };
  }

  #patterns(record: JsonRecord, key: string, path: string): HirPattern[] {
    return readArray(record, key, path).map((entry, index) =>
      this.#pattern(entry, `${path}.${key}[${index}]`)
    );
  }

  #fieldIndex(type: TypeId, res: Res, name: string, path: string): number {
    const desc = this.arena.get(type);
    if (desc.kind !== "adt") {
      throw new FixtureError(`struct pattern at ${path} must have an ADT type`);
    }
    const variant = variantOfRes(this.items.adtDef(desc.adt), res);
    const index = variant.fields.findIndex((field) => field.name === name);
    if (index < 0) {
      throw new FixtureError(`${variant.name} has no field "${name}" (${path})`);
    }
    return index;
  }

  #pattern(raw: unknown, path: string): HirPattern {
    const record = expectRecord(raw, path);
    const kind = readString(record, "kind", path);
    const hirId = this.#nextHirId++;
    const span = this.#span(record, path);
    const type = this.#type(readString(record, "type", path));
    this.#annotate(hirId, record, type, path);
    const base = { hirId, span };
    const subpattern = (key: string): HirPattern | undefined =>
      record[key] === undefined ? undefined : this.#pattern(record[key], `${path}.${key}`);
    const dotDotPos = readOptionalNumber(record, "rest", path);
    const rest = dotDotPos === undefined ? {} : { dotDotPos };

    switch (kind) {
      case "wild":
        return { ...base, kind: "wild" };
      case "binding": {
        const name = readString(record, "name", path);
        this.typeck.recordBindingMode(
          hirId,
          bindingAnnotationOf(readOptionalString(record, "mode", path), path)
        );
        const sub = subpattern("subpattern");
        return {
          ...base,
          kind: "binding",
          varId: hirId,
          ident: { name, span: this.#identSpan(record, span, path) },
          ...(sub ? { subpattern: sub } : {}),
        };
      }
      case "literal":
        return { ...base, kind: "literal", expr: this.#expr(record.value, type, span, `${path}.value`) };
      case "range": {
        const lo = record.lo === undefined ? undefined : this.#expr(record.lo, type, span, `${path}.lo`);
        const hi = record.hi === undefined ? undefined : this.#expr(record.hi, type, span, `${path}.hi`);
        return {
          ...base,
          kind: "range",
          ...(lo ? { lo } : {}),
          ...(hi ? { hi } : {}),
          end: rangeEndOf(readOptionalString(record, "end", path), path),
        };
      }
      case "path":
        return { ...base, kind: "path", qpath: this.#qpath(readString(record, "path", path), hirId) };
      case "tuple-struct":
        return {
          ...base,
          kind: "tuple-struct",
          qpath: this.#qpath(readString(record, "path", path), hirId),
          patterns: this.#patterns(record, "patterns", path),
          ...rest,
        };
      case "struct": {
        const qpath = this.#qpath(readString(record, "path", path), hirId);
        const res = this.typeck.qpathRes(qpath, hirId);
        const fields = readArray(record, "fields", path).map((entry, index): HirPatField => {
          const fieldPath = `${path}.fields[${index}]`;
          const field = expectRecord(entry, fieldPath);
          const name = readString(field, "name", fieldPath);
          const pattern = this.#pattern(field.pattern, `${fieldPath}.pattern`);
          const fieldHirId = this.#nextHirId++;
          this.typeck.recordFieldIndex(fieldHirId, this.#fieldIndex(type, res, name, fieldPath));
          return { hirId: fieldHirId, name, pattern, span: pattern.span };
        });
        return {
          ...base,
          kind: "struct",
          qpath,
          fields,
          hasRest: readBoolean(record, "hasRest", path) ?? false,
        };
      }
      case "tuple":
        return { ...base, kind: "tuple", patterns: this.#patterns(record, "patterns", path), ...rest };
      case "ref":
      case "box": {
        const sub = subpattern("subpattern");
        if (!sub) {
          throw new FixtureError(`missing ${path}.subpattern`);
        }
        return kind === "ref"
          ? { ...base, kind, subpattern: sub, mutable: readBoolean(record, "mutable", path) ?? false }
          : { ...base, kind, subpattern: sub };
      }
      case "slice": {
        const middle = subpattern("middle");
        return {
          ...base,
          kind: "slice",
          prefix: this.#patterns(record, "prefix", path),
          ...(middle ? { middle } : {}),
          suffix: this.#patterns(record, "suffix", path),
        };
      }
      case "or":
        return { ...base, kind: "or", patterns: this.#patterns(record, "patterns", path) };
      default:
        throw new FixtureError(`unknown pattern kind "${kind}" at ${path}`);
    }
  }

  #identSpan(record: JsonRecord, span: SourceSpan, path: string): SourceSpan {
    const ident = readArray(record, "identSpan", path);
    const [start, end] = ident;
    if (typeof start === "number" && typeof end === "number") {
      return { file: this.#file, start, end };
    }
    return { ...span };
  }
}

/** Builds items, typing results and surface patterns from a parsed JSON fixture. */
export const decodeFixture = (raw: unknown, file: string): LoweringFixture => {
  const root = expectRecord(raw, "fixture");
  const name = readOptionalString(root, "file", "fixture") ?? file;
  return new FixtureDecoder(name).decode(root);
};
