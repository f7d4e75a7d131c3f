/**
 * ACL Selection
 *
 * Resolves the lifecycle variant once from configuration and builds the one
 * ACL descriptor every rule resource refers to.
 */

import { ConfigurationError } from "./errors";
import type { Fingerprint, NaclModuleConfig } from "../types/schemas";

/**
 * `new-acl`: a rule content change renames the ACL, so a new ACL with new
 * rules is created before the old one goes away.
 * `in-place`: the ACL keeps its identity and rules are replaced one by one.
 */
export type RuleReplacement = "new-acl" | "in-place";

export type AclVariant =
  | { kind: "create-before-destroy"; ruleReplacement: RuleReplacement }
  | { kind: "destroy-before-create"; ruleReplacement: "in-place" }
  | { kind: "external"; networkAclId: string; ruleReplacement: "in-place" };

export type ManagedLifecycle = Exclude<AclVariant["kind"], "external">;

export type AclSelection =
  | { kind: "external"; networkAclId: string }
  | {
      kind: "managed";
      lifecycle: ManagedLifecycle;
      logicalName: string;
      name: string;
      tags: Record<string, string>;
      vpcId: string;
      subnetIds: string[];
    };

export function resolveAclVariant(config: NaclModuleConfig): AclVariant {
  const targets = config.target_network_acl_id;
  if (targets.length > 1) {
    throw new ConfigurationError(
      "target_network_acl_id",
      `at most one external network ACL id may be given, got ${targets.length}`
    );
  }

  if (targets.length === 1) {
    const networkAclId = targets[0].trim();
    if (networkAclId === "") {
      throw new ConfigurationError(
        "target_network_acl_id[0]",
        "the external network ACL id is empty; remove the entry to create a network ACL instead"
      );
    }
    return { kind: "external", networkAclId, ruleReplacement: "in-place" };
  }

  if (config.create_before_destroy) {
    // A preserved ACL id cannot also be swapped for a fresh ACL on rule changes.
    return {
      kind: "create-before-destroy",
      ruleReplacement: config.preserve_network_acl_id ? "in-place" : "new-acl",
    };
  }

  return { kind: "destroy-before-create", ruleReplacement: "in-place" };
}

/** Name suffix used while rule changes force a new ACL, otherwise undefined. */
export function rotationSuffix(variant: AclVariant, fingerprint: Fingerprint): string | undefined {
  return variant.ruleReplacement === "new-acl" ? fingerprint.salt : undefined;
}

export function selectAcl(config: NaclModuleConfig, variant: AclVariant, suffix?: string): AclSelection {
  if (variant.kind === "external") {
    return { kind: "external", networkAclId: variant.networkAclId };
  }

  if (config.network_acl_name.length > 1) {
    throw new ConfigurationError(
      "network_acl_name",
      `at most one network ACL name may be given, got ${config.network_acl_name.length}`
    );
  }
  if (config.vpc_id === undefined) {
    throw new ConfigurationError("vpc_id", "vpc_id is required to create a network ACL");
  }

  const baseName = config.network_acl_name.length === 1 ? config.network_acl_name[0] : config.name;
  const name = suffix ? `${baseName}-${suffix}` : baseName;

  return {
    kind: "managed",
    lifecycle: variant.kind,
    logicalName: suffix ? `acl-${suffix}` : "acl",
    name,
    tags: { ...config.tags, Name: name },
    vpcId: config.vpc_id,
    subnetIds: config.subnet_ids,
  };
}
