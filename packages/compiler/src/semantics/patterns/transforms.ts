import type { TypeId } from "../ids.js";
import type { TypeArena } from "../typing/type-arena.js";
import { PatternFolder } from "./fold.js";
import type { Pattern } from "./nodes.js";

class AscriptionEraser extends PatternFolder {
  override foldPattern(pattern: Pattern): Pattern {
    if (pattern.kind.kind === "ascribe-user-type") {
      return this.foldPattern(pattern.kind.subpattern);
    }
    return super.foldPattern(pattern);
  }
}

/** Drops user type ascriptions once type annotations have been checked. */
export const eraseAscriptions = (pattern: Pattern): Pattern =>
  new AscriptionEraser().foldPattern(pattern);

class TypeSubstituter extends PatternFolder {
  readonly #arena: TypeArena;
  readonly #args: readonly TypeId[];

  constructor(arena: TypeArena, args: readonly TypeId[]) {
    super();
    this.#arena = arena;
    this.#args = args;
  }

  override foldType(type: TypeId): TypeId {
    return this.#arena.substitute(type, this.#args);
  }
}

/** Instantiates the type parameters mentioned by a pattern tree, constant values included. */
export const substitutePatternTypes = (
  pattern: Pattern,
  arena: TypeArena,
  args: readonly TypeId[]
): Pattern => new TypeSubstituter(arena, args).foldPattern(pattern);
