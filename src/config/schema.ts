import { Type, type Static } from "@sinclair/typebox";

export const ReelsortConfigSchema = Type.Object(
  {
    strip_prefixes: Type.Optional(
      Type.Array(Type.String(), {
        description: "Release-group prefixes removed from the start of a title; first match wins",
      }),
    ),
    keep_period: Type.Optional(
      Type.Array(Type.String(), {
        description: "Strings whose periods are kept in titles, e.g. S.W.A.T",
      }),
    ),
    edition_map: Type.Optional(
      Type.Array(Type.Tuple([Type.String(), Type.String()]), {
        description: "Ordered [pattern, replacement] pairs; first match wins",
      }),
    ),
    duplicates: Type.Optional(
      Type.Object(
        {
          force_overwrite: Type.Optional(Type.Boolean({ default: false })),
        },
        { additionalProperties: false },
      ),
    ),
    safe_copy: Type.Optional(
      Type.Boolean({
        default: false,
        description: "Always copy through a .partial~ staging file instead of renaming",
      }),
    ),
    test: Type.Optional(
      Type.Boolean({
        default: false,
        description: "Dry run: report what would happen without touching the filesystem",
      }),
    ),
    verify: Type.Optional(
      Type.Union([Type.Literal("none"), Type.Literal("size"), Type.Literal("hash")], {
        description: "Check applied to a staged copy before it replaces the destination",
      }),
    ),
    hash_algo: Type.Optional(Type.Union([Type.Literal("sha256"), Type.Literal("sha512")])),
    destination_template: Type.Optional(Type.String({ minLength: 1 })),
  },
  { additionalProperties: false },
);

export type ReelsortConfig = Static<typeof ReelsortConfigSchema>;
