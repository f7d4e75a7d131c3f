/**
 * Network ACL Planner
 *
 * Pure first stage: validated configuration in, one desired-state plan out.
 * The Pulumi component only ever reads a plan, so everything that can fail on
 * configuration fails here, before a resource is declared.
 */

import { normalizeRules } from "./normalizer";
import { partitionRules, type PartitionedRules } from "./partitioner";
import { fingerprintRules, resolveReplacementSalt } from "./fingerprint";
import { resolveAclVariant, rotationSuffix, selectAcl, type AclSelection, type AclVariant } from "./acl-selection";
import { ConfigurationError } from "./errors";
import type { Fingerprint, NaclModuleConfig } from "../types/schemas";

export type RuleMode = "inline" | "resourced";

export interface DisabledPlan {
  enabled: false;
}

export interface EnabledPlan {
  enabled: true;
  mode: RuleMode;
  variant: AclVariant;
  acl: AclSelection;
  rules: PartitionedRules;
  fingerprint: Fingerprint;
  /** Appended to ACL, rule and association names while rule changes force a new ACL. */
  rotation?: string;
  timeouts: { create: string; delete: string };
}

export type NaclPlan = DisabledPlan | EnabledPlan;

export function buildNaclPlan(config: NaclModuleConfig, previous?: Fingerprint): NaclPlan {
  if (!config.enabled) {
    return { enabled: false };
  }

  const variant = resolveAclVariant(config);
  const mode: RuleMode = config.inline_rules_enabled ? "inline" : "resourced";

  if (mode === "inline" && variant.kind === "external") {
    throw new ConfigurationError(
      "inline_rules_enabled",
      "inline rules are embedded in a network ACL this module creates and cannot be used with target_network_acl_id"
    );
  }

  const rules = partitionRules(normalizeRules(config), mode === "inline");
  const fingerprint = resolveReplacementSalt(fingerprintRules(rules.keyed), previous);
  const rotation = rotationSuffix(variant, fingerprint);

  return {
    enabled: true,
    mode,
    variant,
    acl: selectAcl(config, variant, rotation),
    rules,
    fingerprint,
    rotation,
    timeouts: {
      create: config.network_acl_create_timeout,
      delete: config.network_acl_delete_timeout,
    },
  };
}

export function ruleLogicalName(plan: EnabledPlan, key: string): string {
  return plan.rotation ? `rule-${plan.rotation}-${key}` : `rule-${key}`;
}

export function associationLogicalName(plan: EnabledPlan, subnetId: string): string {
  return plan.rotation ? `association-${plan.rotation}-${subnetId}` : `association-${subnetId}`;
}
