export type Direction = "ingress" | "egress";
export type RuleAction = "allow" | "deny";

/** The single address a resolved rule is bound to. */
export type RuleTarget =
  | { kind: "cidr"; cidrBlock: string }
  | { kind: "ipv6"; ipv6CidrBlock: string }
  | { kind: "self" }
  | { kind: "prefix-list"; prefixListId: string };

export type AddressTarget = Extract<RuleTarget, { kind: "cidr" | "ipv6" }>;

export interface RuleFields {
  key: string;
  ruleNumber: number;
  direction: Direction;
  protocol: string;
  action: RuleAction;
  fromPort: number;
  toPort: number;
  icmpType?: number;
  icmpCode?: number;
  description?: string;
  /** Input path the rule came from, used in diagnostics only. */
  source: string;
}

export interface MatrixSubject {
  key: string;
  self: boolean;
  cidrBlocks: string[];
  ipv6CidrBlocks: string[];
  prefixListIds: string[];
}

export interface ListRule extends RuleFields {
  origin: "list";
  target: AddressTarget;
}

export interface MatrixRule extends RuleFields {
  origin: "matrix";
  subject: MatrixSubject;
}

export type CanonicalRule = ListRule | MatrixRule;

export interface ResolvedRule extends RuleFields {
  target: RuleTarget;
}
