import { validateConfig, type NaclModuleConfig, type NaclModuleInput } from "../src/types/schemas";

export const TEST_VPC_ID = "vpc-test";

/** Validated module config with a VPC id filled in. */
export function moduleConfig(input: NaclModuleInput = {}): NaclModuleConfig {
  return validateConfig({ vpc_id: TEST_VPC_ID, ...input });
}

export const sshRule = {
  key: "ssh",
  rule_number: 100,
  type: "ingress",
  protocol: "tcp",
  action: "allow",
  cidr_block: "10.0.0.0/8",
  from_port: 22,
  to_port: 22,
} as const;

export const httpsRule = {
  key: "https",
  rule_number: 200,
  type: "ingress",
  protocol: "tcp",
  action: "allow",
  cidr_block: "0.0.0.0/0",
  from_port: 443,
  to_port: 443,
} as const;
