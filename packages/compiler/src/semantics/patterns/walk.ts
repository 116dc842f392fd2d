import type { FieldPattern, Pattern, PatternError, PatternKind } from "./nodes.js";
import type { LocalVarId, TypeId } from "../ids.js";

export type WalkControl = {
  skipChildren?: boolean;
  stop?: boolean;
};

const childPatterns = (kind: PatternKind): readonly Pattern[] => {
  const fromFields = (fields: readonly FieldPattern[]) =>
    fields.map((field) => field.pattern);

  switch (kind.kind) {
    case "wild":
    case "constant":
    case "range":
    case "error":
      return [];
    case "ascribe-user-type":
    case "deref":
      return [kind.subpattern];
    case "binding":
      return kind.subpattern ? [kind.subpattern] : [];
    case "variant":
    case "leaf":
      return fromFields(kind.subpatterns);
    case "slice":
    case "array":
      return [
        ...kind.prefix,
        ...(kind.middle ? [kind.middle] : []),
        ...kind.suffix,
      ];
    case "or":
      return kind.patterns;
  }
};

const walkPatternInternal = ({
  pattern,
  onEnterPattern,
  onExitPattern,
}: {
  pattern: Pattern;
  onEnterPattern?: (pattern: Pattern) => WalkControl | void;
  onExitPattern?: (pattern: Pattern) => void;
}): boolean => {
  const control = onEnterPattern?.(pattern);
  if (control?.stop) {
    return true;
  }

  if (!control?.skipChildren) {
    for (const child of childPatterns(pattern.kind)) {
      if (walkPatternInternal({ pattern: child, onEnterPattern, onExitPattern })) {
        return true;
      }
    }
  }

  onExitPattern?.(pattern);
  return false;
};

export const walkPattern = ({
  pattern,
  onEnterPattern,
  onExitPattern,
}: {
  pattern: Pattern;
  onEnterPattern?: (pattern: Pattern) => WalkControl | void;
  onExitPattern?: (pattern: Pattern) => void;
}): void => {
  walkPatternInternal({ pattern, onEnterPattern, onExitPattern });
};

export type BindingVisit = {
  name: string;
  var: LocalVarId;
  varType: TypeId;
  pattern: Pattern;
};

/** Visits every binding in pre-order, including bindings under `@` subpatterns. */
export const eachBinding = (
  pattern: Pattern,
  visit: (binding: BindingVisit) => void
): void => {
  walkPattern({
    pattern,
    onEnterPattern: (current) => {
      if (current.kind.kind === "binding") {
        visit({
          name: current.kind.name,
          var: current.kind.var,
          varType: current.kind.varType,
          pattern: current,
        });
      }
    },
  });
};

export const collectPatternErrors = (pattern: Pattern): PatternError[] => {
  const errors: PatternError[] = [];
  walkPattern({
    pattern,
    onEnterPattern: (current) => {
      if (current.kind.kind === "error") {
        errors.push({
          error: current.kind.error,
          diagnostic: current.kind.diagnostic,
        });
      }
    },
  });
  return errors;
};
