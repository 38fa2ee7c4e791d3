import { ALIAS_MATCH_CONFIDENCE, UNMATCHED_CONFIDENCE } from "./constants";
import { DEFAULT_REFERENCE_TABLES, normalizeLookupKey } from "./referenceCatalog";
import type { CanonicalResolution, RawLabMention, ReferenceEntry, ReferenceTables } from "./types";

interface AliasMatch {
  entry: ReferenceEntry;
  alias: string;
  position: number;
}

// Aliases match on whole tokens so that "mch" never claims an "MCHC" label.
const aliasPosition = (paddedLabel: string, alias: string): number => paddedLabel.indexOf(` ${alias} `);

const earliestAlias = (paddedLabel: string, entry: ReferenceEntry): AliasMatch | null => {
  let best: AliasMatch | null = null;
  for (const alias of entry.aliases) {
    const position = aliasPosition(paddedLabel, alias);
    if (position >= 0 && (!best || position < best.position)) {
      best = { entry, alias, position };
    }
  }
  return best;
};

export const resolveCanonicalTest = (
  mention: Pick<RawLabMention, "label">,
  tables: ReferenceTables = DEFAULT_REFERENCE_TABLES
): CanonicalResolution => {
  const normalized = normalizeLookupKey(mention.label);
  if (normalized) {
    const paddedLabel = ` ${normalized} `;
    // The test named first in the label wins; "Neutrophils (WBC diff)" is a neutrophil count.
    let winner: AliasMatch | null = null;
    for (const entry of tables.tests) {
      const match = earliestAlias(paddedLabel, entry);
      if (match && (!winner || match.position < winner.position)) {
        winner = match;
      }
    }
    if (winner) {
      return {
        canonicalKey: winner.entry.key,
        confidence: ALIAS_MATCH_CONFIDENCE,
        method: "alias",
        matchedAlias: winner.alias
      };
    }
  }

  return {
    canonicalKey: null,
    confidence: UNMATCHED_CONFIDENCE,
    method: "unmatched"
  };
};
