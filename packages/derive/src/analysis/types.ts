import type { DeriveErrorLocation } from "../util/errors.js";

/**
 * How to compare one value, as a tree of core instances.
 *
 * - `instance`: a core constant such as `float64`.
 * - `factory`: a core factory applied to nested comparators, e.g. `array(string)`.
 * - `record`: an inline object type; `typeText` is its source text.
 * - `derived`: an instance generated in the same module (called with
 *   comparators for its type arguments when generic).
 * - `typeParameter`: the factory parameter of a generic declaration.
 * - `expression`: verbatim `@isSame` override.
 */
export type Comparator =
  | {
      kind: "instance";
      name: string;
    }
  | {
      kind: "factory";
      name: string;
      args: Comparator[];
    }
  | {
      kind: "record";
      typeText: string;
      fields: FieldComparator[];
    }
  | {
      kind: "derived";
      typeName: string;
      typeArgs: Comparator[];
    }
  | {
      kind: "typeParameter";
      name: string;
    }
  | {
      kind: "expression";
      text: string;
    };

export interface FieldComparator {
  /** Property name, or position for positional records. */
  key: string | number;
  comparator: Comparator;
}

/** Static shape of an aggregate declaration. */
export type AggregateShape =
  | {
      kind: "named";
      fields: FieldComparator[];
    }
  | {
      kind: "positional";
      fields: FieldComparator[];
    }
  | {
      kind: "unit";
    };

/** A declaration annotated with `@derive IsSame`, resolved for emission. */
export interface DeriveTarget {
  typeName: string;
  typeParameters: string[];
  shape: AggregateShape;
  location: DeriveErrorLocation;
}

/** Names the generated module must import. */
export interface ModuleImports {
  /** Value imports from the protocol module. */
  coreValues: Set<string>;
  /** Type-only imports from the protocol module (beyond `IsSame`), local name -> export name. */
  coreTypes: Map<string, string>;
}
