import { describe, it, expect } from "vitest";
import { formatIssues, validateConfigSafe, type NaclModuleInput } from "../src/types/schemas";
import { sshRule, TEST_VPC_ID } from "./helpers";

function issuesOf(input: NaclModuleInput): string[] {
  const result = validateConfigSafe(input);
  return result.success ? [] : formatIssues(result.error);
}

describe("NaclModuleConfigSchema", () => {
  it("applies the documented defaults", () => {
    const result = validateConfigSafe({ vpc_id: TEST_VPC_ID });

    expect(result.success).toBe(true);
    expect(result.success && result.data).toMatchObject({
      enabled: true,
      name: "nacl",
      subnet_ids: [],
      rules: [],
      rules_map: {},
      rule_matrix: [],
      target_network_acl_id: [],
      network_acl_name: [],
      create_before_destroy: true,
      preserve_network_acl_id: false,
      allow_all_egress: true,
      allow_all_egress_rule_number: 100,
      inline_rules_enabled: false,
      network_acl_create_timeout: "10m",
      network_acl_delete_timeout: "15m",
    });
  });

  it("rejects more than one external ACL id", () => {
    expect(issuesOf({ vpc_id: TEST_VPC_ID, target_network_acl_id: ["acl-1", "acl-2"] })).toEqual([
      "target_network_acl_id: at most one external network ACL id may be given",
    ]);
  });

  it("rejects more than one ACL name", () => {
    expect(issuesOf({ vpc_id: TEST_VPC_ID, network_acl_name: ["a", "b"] })).toEqual([
      "network_acl_name: at most one network ACL name may be given",
    ]);
  });

  it("requires vpc_id only while enabled", () => {
    expect(issuesOf({})).toEqual(["vpc_id: vpc_id is required when the module is enabled"]);
    expect(issuesOf({ enabled: false })).toEqual([]);
  });

  it("requires exactly one address family on list rules", () => {
    expect(issuesOf({ vpc_id: TEST_VPC_ID, rules: [{ ...sshRule, ipv6_cidr_block: "2001:db8::/32" }] })).toEqual([
      "rules.0.cidr_block: exactly one of cidr_block or ipv6_cidr_block must be set",
    ]);
    expect(issuesOf({ vpc_id: TEST_VPC_ID, rules: [{ ...sshRule, cidr_block: undefined }] })).toEqual([
      "rules.0.cidr_block: exactly one of cidr_block or ipv6_cidr_block must be set",
    ]);
  });

  it("rejects ICMP fields on non-ICMP rules", () => {
    expect(issuesOf({ vpc_id: TEST_VPC_ID, rules: [{ ...sshRule, icmp_type: 8 }] })).toEqual([
      'rules.0.icmp_type: icmp_type and icmp_code only apply to icmp (1) or icmpv6 (58) rules, not protocol "tcp"',
    ]);
  });

  it("requires both ports on TCP and UDP rules", () => {
    const portless = { key: "dns", rule_number: 300, type: "ingress", protocol: "tcp", action: "allow", cidr_block: "10.0.0.0/8" } as const;

    expect(issuesOf({ vpc_id: TEST_VPC_ID, rules: [portless] })).toEqual([
      'rules.0.from_port: from_port is required for protocol "tcp"',
      'rules.0.to_port: to_port is required for protocol "tcp"',
    ]);
    expect(issuesOf({ vpc_id: TEST_VPC_ID, rules: [{ ...portless, protocol: 17, to_port: 53 }] })).toEqual([
      'rules.0.from_port: from_port is required for protocol "17"',
    ]);
    expect(issuesOf({ vpc_id: TEST_VPC_ID, rules: [{ ...portless, protocol: "-1" }] })).toEqual([]);
  });

  it("accepts rule descriptions", () => {
    expect(issuesOf({ vpc_id: TEST_VPC_ID, rules: [{ ...sshRule, description: "admin ssh" }] })).toEqual([]);
  });

  it("rejects IPv4 CIDR blocks out of range", () => {
    expect(issuesOf({ vpc_id: TEST_VPC_ID, rules: [{ ...sshRule, cidr_block: "999.1.1.1/24" }] })).toEqual([
      "rules.0.cidr_block: must be an IPv4 CIDR block",
    ]);
    expect(issuesOf({ vpc_id: TEST_VPC_ID, rules: [{ ...sshRule, cidr_block: "10.0.0.0/33" }] })).toEqual([
      "rules.0.cidr_block: must be an IPv4 CIDR block",
    ]);
    expect(issuesOf({ vpc_id: TEST_VPC_ID, rule_matrix: [{ cidr_blocks: ["255.255.255.255/32", "0.0.0.0/0"] }] })).toEqual([]);
  });

  it("rejects inverted port ranges", () => {
    expect(issuesOf({ vpc_id: TEST_VPC_ID, rules: [{ ...sshRule, from_port: 23, to_port: 22 }] })).toEqual([
      "rules.0.from_port: from_port 23 is greater than to_port 22",
    ]);
  });

  it("does not accept address fields on matrix rules", () => {
    const issues = issuesOf({
      vpc_id: TEST_VPC_ID,
      rule_matrix: [{ self: true, rules: [{ ...sshRule }] }],
    });

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^rule_matrix\.0\.rules\.0: Unrecognized key/);
  });
});
