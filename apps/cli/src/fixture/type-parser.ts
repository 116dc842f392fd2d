import type {
  DefId,
  IntTypeName,
  TypeArena,
  TypeId,
  UintTypeName,
} from "@patlower/compiler";
import { FixtureError } from "./errors.js";

export type TypeScope = {
  arena: TypeArena;
  adts: ReadonlyMap<string, DefId>;
  /** Generic parameter names in scope, by index. */
  params?: readonly string[];
};

const INT_NAMES = new Set<string>(["i8", "i16", "i32", "i64", "i128", "isize"]);
const UINT_NAMES = new Set<string>(["u8", "u16", "u32", "u64", "u128", "usize"]);

const isIntName = (name: string): name is IntTypeName => INT_NAMES.has(name);
const isUintName = (name: string): name is UintTypeName => UINT_NAMES.has(name);

const TOKEN = /\s*(\{error\}|[A-Za-z_][A-Za-z0-9_]*|\d+|[&()[\]<>,;])/y;

const tokenize = (source: string): string[] => {
  const tokens: string[] = [];
  TOKEN.lastIndex = 0;
  while (TOKEN.lastIndex < source.length) {
    const start = TOKEN.lastIndex;
    const match = TOKEN.exec(source);
    if (!match?.[1]) {
      if (source.slice(start).trim() === "") break;
      throw new FixtureError(`unexpected character in type "${source}" at ${start}`);
    }
    tokens.push(match[1]);
  }
  return tokens;
};

/**
 * Parses type syntax such as `&&Option<i32>`, `(u8, char)`, `[u8; 4]` or
 * `&[u8]` and interns the result.
 */
export const parseType = (source: string, scope: TypeScope): TypeId => {
  const tokens = tokenize(source);
  let position = 0;

  const peek = (): string | undefined => tokens[position];
  const next = (): string => {
    const token = tokens[position];
    if (token === undefined) {
      throw new FixtureError(`unexpected end of type "${source}"`);
    }
    position += 1;
    return token;
  };
  const expect = (token: string): void => {
    const actual = next();
    if (actual !== token) {
      throw new FixtureError(`expected "${token}" in type "${source}", found "${actual}"`);
    }
  };

  const parseList = (close: string): TypeId[] => {
    const types: TypeId[] = [];
    while (peek() !== close) {
      types.push(parse());
      if (peek() === ",") {
        next();
      } else {
        break;
      }
    }
    expect(close);
    return types;
  };

  const parseNamed = (name: string): TypeId => {
    const { arena } = scope;
    if (isIntName(name)) return arena.internInt(name);
    if (isUintName(name)) return arena.internUint(name);
    switch (name) {
      case "f32":
      case "f64":
        return arena.internFloat(name);
      case "bool":
        return arena.internBool();
      case "char":
        return arena.internChar();
      case "str":
        return arena.internStr();
      case "{error}":
        return arena.internError();
    }

    const paramIndex = scope.params?.indexOf(name) ?? -1;
    if (paramIndex >= 0) {
      return arena.internParam(paramIndex, name);
    }

    const adt = scope.adts.get(name);
    if (adt === undefined) {
      throw new FixtureError(`unknown type "${name}" in "${source}"`);
    }
    if (peek() === "<") {
      next();
      return arena.internAdt(adt, parseList(">"));
    }
    return arena.internAdt(adt);
  };

  const parse = (): TypeId => {
    const token = next();
    switch (token) {
      case "&": {
        const mutable = peek() === "mut";
        if (mutable) next();
        return scope.arena.internRef(parse(), mutable);
      }
      case "(": {
        const elements = parseList(")");
        return scope.arena.internTuple(elements);
      }
      case "[": {
        const element = parse();
        if (peek() === ";") {
          next();
          const length = Number(next());
          expect("]");
          return scope.arena.internArray(element, length);
        }
        expect("]");
        return scope.arena.internSlice(element);
      }
      default:
        return parseNamed(token);
    }
  };

  const type = parse();
  if (position !== tokens.length) {
    throw new FixtureError(`unexpected "${tokens[position]}" after type in "${source}"`);
  }
  return type;
};
