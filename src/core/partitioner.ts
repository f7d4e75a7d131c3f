/**
 * Rule Partitioner
 *
 * Explodes matrix rules into one rule per target and splits the result either
 * into ordered ingress/egress views (inline mode) or into a map keyed by rule
 * key (resourced mode). Key and rule-number conflicts are rejected here, before
 * anything is declared to the provider.
 */

import { ConfigurationError, RuleConflictError } from "./errors";
import type { CanonicalRule, Direction, MatrixRule, ResolvedRule, RuleTarget } from "../types/rules";

const MAX_RULE_NUMBER = 32766;

export interface PartitionedRules {
  ingress: ResolvedRule[];
  egress: ResolvedRule[];
  keyed: ReadonlyMap<string, ResolvedRule>;
}

export function partitionRules(rules: CanonicalRule[], inline: boolean): PartitionedRules {
  const resolved = rules.flatMap(explodeRule);
  assertUniqueKeys(resolved);
  assertDistinctRuleNumbers(resolved);

  if (inline) {
    return {
      ingress: resolved.filter((rule) => rule.direction === "ingress"),
      egress: resolved.filter((rule) => rule.direction === "egress"),
      keyed: new Map(),
    };
  }

  return {
    ingress: [],
    egress: [],
    keyed: new Map(resolved.map((rule) => [rule.key, rule])),
  };
}

/**
 * List rules pass through unchanged. A matrix rule becomes one `#self` rule
 * when its subject targets self, otherwise one rule per listed target with
 * the target index as key suffix and rule-number offset.
 */
export function explodeRule(rule: CanonicalRule): ResolvedRule[] {
  if (rule.origin === "list") {
    return [bind(rule, rule.key, rule.ruleNumber, rule.target)];
  }

  const targets = subjectTargets(rule);
  const subjectInput = `rule_matrix.${rule.subject.key}`;

  if (rule.subject.self && targets.length > 0) {
    throw new ConfigurationError(
      subjectInput,
      "self cannot be combined with cidr_blocks, ipv6_cidr_blocks or prefix_list_ids"
    );
  }
  if (rule.subject.self) {
    return [bind(rule, `${rule.key}#self`, rule.ruleNumber, { kind: "self" })];
  }
  if (targets.length === 0) {
    throw new ConfigurationError(
      subjectInput,
      "targets nothing: set self or list at least one of cidr_blocks, ipv6_cidr_blocks, prefix_list_ids"
    );
  }

  const lastNumber = rule.ruleNumber + targets.length - 1;
  if (lastNumber > MAX_RULE_NUMBER) {
    throw new ConfigurationError(
      rule.source,
      `rule_number ${rule.ruleNumber} spread over ${targets.length} targets ends at ${lastNumber}, above ${MAX_RULE_NUMBER}`
    );
  }

  return targets.map((target, index) => bind(rule, `${rule.key}#${index}`, rule.ruleNumber + index, target));
}

function subjectTargets(rule: MatrixRule): RuleTarget[] {
  const { subject } = rule;
  return [
    ...subject.cidrBlocks.map((cidrBlock): RuleTarget => ({ kind: "cidr", cidrBlock })),
    ...subject.ipv6CidrBlocks.map((ipv6CidrBlock): RuleTarget => ({ kind: "ipv6", ipv6CidrBlock })),
    ...subject.prefixListIds.map((prefixListId): RuleTarget => ({ kind: "prefix-list", prefixListId })),
  ];
}

function bind(rule: CanonicalRule, key: string, ruleNumber: number, target: RuleTarget): ResolvedRule {
  return {
    key,
    ruleNumber,
    direction: rule.direction,
    protocol: rule.protocol,
    action: rule.action,
    fromPort: rule.fromPort,
    toPort: rule.toPort,
    icmpType: rule.icmpType,
    icmpCode: rule.icmpCode,
    description: rule.description,
    source: rule.source,
    target,
  };
}

export function assertUniqueKeys(rules: ResolvedRule[]): void {
  const seen = new Map<string, ResolvedRule>();
  for (const rule of rules) {
    const first = seen.get(rule.key);
    if (first) {
      throw new RuleConflictError(
        rule.source,
        `rule key "${rule.key}" is already used by ${first.source}; give one of them a different key`
      );
    }
    seen.set(rule.key, rule);
  }
}

export function assertDistinctRuleNumbers(rules: ResolvedRule[]): void {
  const seen = new Map<string, ResolvedRule>();
  for (const rule of rules) {
    const slot = numberSlot(rule.direction, rule.ruleNumber);
    const first = seen.get(slot);
    if (first) {
      throw new RuleConflictError(
        rule.source,
        `${rule.direction} rule_number ${rule.ruleNumber} of "${rule.key}" is already used by "${first.key}" (${first.source})`
      );
    }
    seen.set(slot, rule);
  }
}

function numberSlot(direction: Direction, ruleNumber: number): string {
  return `${direction}:${ruleNumber}`;
}
