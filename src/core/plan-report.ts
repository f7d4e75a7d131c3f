import { isIcmpProtocol, ALL_PROTOCOLS } from "./protocol";
import type { NaclPlan } from "./planner";
import type { ResolvedRule, RuleTarget } from "../types/rules";

export function describeTarget(target: RuleTarget): string {
  switch (target.kind) {
    case "cidr":
      return target.cidrBlock;
    case "ipv6":
      return target.ipv6CidrBlock;
    case "self":
      return "self (VPC CIDR)";
    case "prefix-list":
      return `prefix list ${target.prefixListId}`;
  }
}

function describePorts(rule: ResolvedRule): string {
  if (rule.protocol === ALL_PROTOCOLS) {
    return "all traffic";
  }
  if (isIcmpProtocol(rule.protocol)) {
    return `${rule.protocol} type ${rule.icmpType ?? -1} code ${rule.icmpCode ?? -1}`;
  }
  return `${rule.protocol} ${rule.fromPort}-${rule.toPort}`;
}

export function describeRule(rule: ResolvedRule): string {
  const line = `${rule.key}: ${rule.direction} #${rule.ruleNumber} ${rule.action} ${describePorts(rule)} ${describeTarget(rule.target)}`;
  return rule.description ? `${line} (${rule.description})` : line;
}

/** Human-readable summary printed by `nacl plan`. */
export function describePlan(plan: NaclPlan): string[] {
  if (!plan.enabled) {
    return ["Module disabled: no network ACL and no rules are declared"];
  }

  const lines: string[] = [];
  if (plan.acl.kind === "external") {
    lines.push(`ACL: external ${plan.acl.networkAclId} (rules edited in place)`);
  } else {
    const replacement = plan.variant.ruleReplacement === "new-acl" ? "rule changes create a new ACL" : "rules edited in place";
    lines.push(`ACL: ${plan.acl.name} (${plan.acl.lifecycle}, ${replacement})`);
    if (plan.acl.subnetIds.length > 0) {
      lines.push(`Subnets: ${plan.acl.subnetIds.join(", ")}`);
    }
  }
  lines.push(`Rules: ${plan.mode}`);
  lines.push(`Fingerprint: ${plan.fingerprint.digest.slice(0, 12)} (salt ${plan.fingerprint.salt})`);

  const rules = plan.mode === "inline" ? [...plan.rules.ingress, ...plan.rules.egress] : [...plan.rules.keyed.values()];
  for (const rule of rules) {
    lines.push(`  ${describeRule(rule)}`);
  }
  return lines;
}
