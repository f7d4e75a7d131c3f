/**
 * Rule Normalizer
 *
 * Flattens the flat `rules` list, the named `rules_map` lists and the
 * `rule_matrix` subjects into one ordered list of canonical rules with keys.
 *
 * Unkeyed rules are keyed by position, so inserting into an unkeyed list
 * changes the key of every rule after the insertion point. Callers who want
 * stable identities give their rules a `key`.
 */

import { ConfigurationError } from "./errors";
import { ALL_PROTOCOLS } from "./protocol";
import type { MatrixRuleSpec, MatrixSubjectSpec, NaclModuleConfig, RuleSpec } from "../types/schemas";
import type { AddressTarget, CanonicalRule, ListRule, MatrixRule, MatrixSubject, RuleFields } from "../types/rules";

/** `rules_map` entry name the flat `rules` list is merged under. */
export const LIST_SENTINEL = "_rules_";
export const ALLOW_ALL_EGRESS_KEY = "_allow_all_egress_";

export function normalizeRules(config: NaclModuleConfig): CanonicalRule[] {
  if (!config.enabled) {
    return [];
  }

  if (Object.prototype.hasOwnProperty.call(config.rules_map, LIST_SENTINEL)) {
    throw new ConfigurationError(
      `rules_map.${LIST_SENTINEL}`,
      `the name "${LIST_SENTINEL}" is reserved for the flat rules list`
    );
  }

  const lists: Array<[string, RuleSpec[]]> = [[LIST_SENTINEL, config.rules], ...Object.entries(config.rules_map)];
  const rules: CanonicalRule[] = [];

  for (const [listName, specs] of lists) {
    specs.forEach((spec, index) => rules.push(fromListSpec(spec, listName, index)));
  }

  config.rule_matrix.forEach((subjectSpec, subjectIndex) => {
    const subject = toSubject(subjectSpec, subjectIndex);
    subjectSpec.rules.forEach((spec, ruleIndex) =>
      rules.push(fromMatrixSpec(spec, subject, `rule_matrix[${subjectIndex}].rules[${ruleIndex}]`, ruleIndex))
    );
  });

  if (config.allow_all_egress) {
    rules.push(allowAllEgress(config.allow_all_egress_rule_number));
  }

  return rules;
}

function fromListSpec(spec: RuleSpec, listName: string, index: number): ListRule {
  const source = listName === LIST_SENTINEL ? `rules[${index}]` : `rules_map.${listName}[${index}]`;
  return {
    ...ruleFields(spec, spec.key ?? `${listName}[${index}]`, source),
    origin: "list",
    target: addressOf(spec, source),
  };
}

function fromMatrixSpec(spec: MatrixRuleSpec, subject: MatrixSubject, source: string, index: number): MatrixRule {
  return {
    ...ruleFields(spec, `${subject.key}#${spec.key ?? index}`, source),
    origin: "matrix",
    subject,
  };
}

function ruleFields(spec: MatrixRuleSpec, key: string, source: string): RuleFields {
  return {
    key,
    ruleNumber: spec.rule_number,
    direction: spec.type,
    protocol: spec.protocol,
    action: spec.action,
    fromPort: spec.from_port ?? 0,
    toPort: spec.to_port ?? 0,
    icmpType: spec.icmp_type,
    icmpCode: spec.icmp_code,
    description: spec.description,
    source,
  };
}

function addressOf(spec: RuleSpec, source: string): AddressTarget {
  if (spec.cidr_block !== undefined) {
    return { kind: "cidr", cidrBlock: spec.cidr_block };
  }
  if (spec.ipv6_cidr_block !== undefined) {
    return { kind: "ipv6", ipv6CidrBlock: spec.ipv6_cidr_block };
  }
  throw new ConfigurationError(source, "exactly one of cidr_block or ipv6_cidr_block must be set");
}

function toSubject(spec: MatrixSubjectSpec, index: number): MatrixSubject {
  return {
    key: spec.key ?? `_matrix_[${index}]`,
    self: spec.self,
    cidrBlocks: spec.cidr_blocks,
    ipv6CidrBlocks: spec.ipv6_cidr_blocks,
    prefixListIds: spec.prefix_list_ids,
  };
}

function allowAllEgress(ruleNumber: number): ListRule {
  return {
    key: ALLOW_ALL_EGRESS_KEY,
    ruleNumber,
    direction: "egress",
    protocol: ALL_PROTOCOLS,
    action: "allow",
    fromPort: 0,
    toPort: 0,
    source: "allow_all_egress",
    origin: "list",
    target: { kind: "cidr", cidrBlock: "0.0.0.0/0" },
  };
}
