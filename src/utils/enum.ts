// utility to define enums with all the extras without needing tons of
// boilerplate and symbols scattered around. also allows enums to attach more
// complex arbitrary data to them.

// export const kResourceFamily = defineEnum({
//    image: {
//       value: "image",
//       dirName: "images",
//    },
//    page: {
//       value: "page",
//       dirName: "pages",
//    },
// } as const);

// kResourceFamily.keys;                 // ("image" | "page")[]
// kResourceFamily.key.image;            // "image"
// kResourceFamily.byKey.page.dirName;   // "pages"
// kResourceFamily.infoByValue.get("image")?.dirName; // "images"

// // types
// export type ResourceFamilyKey = typeof kResourceFamily.$key; // "image" | "page"

type EnumValue = string | number;

// the input definition.
// requires at least a "value" field, can have any other fields.
type EnumDef = Record<string, { value: EnumValue } & Record<string, unknown>>;

type EnumKeyUnion<D extends EnumDef> = keyof D & string;
type EnumValueUnion<D extends EnumDef> = D[EnumKeyUnion<D>]["value"];

// "infos" are the full entries with key field added
type EnumInfo<D extends EnumDef, K extends EnumKeyUnion<D>> = {
  key: K;
} & D[K];
type EnumInfoUnion<D extends EnumDef> = {
  [K in EnumKeyUnion<D>]: { key: K } & D[K];
}[EnumKeyUnion<D>];

export function defineEnum<const D extends EnumDef>(def: D) {
  // specify that there is at least 1 key.
  const keys = Object.keys(def) as [EnumKeyUnion<D>, ...EnumKeyUnion<D>[]];

  // key.image -> "image"
  const key = Object.fromEntries(keys.map((k) => [k, k])) as {
    [K in EnumKeyUnion<D>]: K;
  };

  const infoByKey = Object.fromEntries(keys.map((k) => [k, { key: k, ...def[k] }])) as {
    [K in EnumKeyUnion<D>]: EnumInfo<D, K>;
  };

  const infos = keys.map((k) => ({ key: k, ...def[k] })) as EnumInfoUnion<D>[];
  const values = keys.map((k) => def[k].value) as EnumValueUnion<D>[];

  // Reverse lookups (Map handles number keys cleanly)
  const infoByValue = new Map<EnumValue, EnumInfoUnion<D>>();
  const infoByKeyName = new Map<string, EnumInfoUnion<D>>();
  keys.forEach((k, i) => {
    infoByValue.set(def[k].value, infos[i]);
    infoByKeyName.set(k, infos[i]);
  });

  // phantom fields for type extraction convenience
  const $key = null as unknown as EnumKeyUnion<D>;
  const $value = null as unknown as EnumValueUnion<D>;
  const $info = null as unknown as EnumInfoUnion<D>;

  function isValidKey(k: unknown): k is EnumKeyUnion<D> {
    return typeof k === "string" && Object.prototype.hasOwnProperty.call(def, k);
  }

  function coerceByKey(k: unknown): EnumInfoUnion<D> | undefined {
    return typeof k === "string" ? infoByKeyName.get(k) : undefined;
  }

  return {
    // phantom fields for type extraction
    $key,
    $value,
    $info,

    key, // e.key.image -> "image" (so you can refer to keys like traditional enums)
    byKey: def, // e.byKey.image -> {value: "image", dirName: "images"}
    infoByKey,
    infoByValue,

    keys,
    values,
    infos,
    keysSet: new Set<string>(keys),

    isValidKey,
    coerceByKey,
  } as const;
}
