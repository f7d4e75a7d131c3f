import { createHash } from "crypto";
import type { Fingerprint } from "../types/schemas";
import type { ResolvedRule } from "../types/rules";

/**
 * JSON with object keys sorted at every level, so equal content always
 * serializes to equal text. Undefined members are dropped like JSON.stringify does.
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => (item === undefined ? "null" : stableStringify(item))).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const members = Object.entries(value)
      .filter(([, member]) => member !== undefined)
      .sort(([a], [b]) => compareKeys(a, b))
      .map(([key, member]) => `${JSON.stringify(key)}:${stableStringify(member)}`);
    return `{${members.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

function compareKeys(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

// Everything a rule resource is built from. `source` is left out so that
// moving a keyed rule between lists does not count as a content change, and
// `description` because no entry field carries it.
function contentOf(rule: ResolvedRule) {
  return {
    key: rule.key,
    ruleNumber: rule.ruleNumber,
    direction: rule.direction,
    protocol: rule.protocol,
    action: rule.action,
    fromPort: rule.fromPort,
    toPort: rule.toPort,
    icmpType: rule.icmpType,
    icmpCode: rule.icmpCode,
    target: rule.target,
  };
}

/** sha256 of the keyed rule map. Insertion order of the map does not matter. */
export function fingerprintRules(keyed: ReadonlyMap<string, ResolvedRule>): string {
  const content: Record<string, ReturnType<typeof contentOf>> = {};
  for (const [key, rule] of keyed) {
    content[key] = contentOf(rule);
  }
  return createHash("sha256").update(stableStringify(content)).digest("hex");
}

/**
 * Keeps the previous salt while the digest is unchanged. A new digest gets a
 * salt derived from the digest and the previous salt, so returning to an
 * earlier rule set still yields a name that was not used right before.
 */
export function resolveReplacementSalt(digest: string, previous?: Fingerprint): Fingerprint {
  if (previous && previous.digest === digest) {
    return previous;
  }
  const salt = createHash("sha256")
    .update(previous?.salt ?? "")
    .update(digest)
    .digest("hex")
    .slice(0, 8);
  return { digest, salt };
}
