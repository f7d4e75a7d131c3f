import { z } from "zod";
import { isIcmpProtocol, isPortedProtocol, normalizeProtocol } from "../core/protocol";

const OCTET = "(25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)";
const Ipv4CidrSchema = z
  .string()
  .regex(new RegExp(`^${OCTET}(\\.${OCTET}){3}\\/(3[0-2]|[12]?\\d)$`), "must be an IPv4 CIDR block");
const Ipv6CidrSchema = z.string().regex(/^[0-9a-fA-F:]+\/\d{1,3}$/, "must be an IPv6 CIDR block");
const DurationSchema = z.string().regex(/^\d+[smh]$/, "must be a duration such as 30s, 10m or 1h");
const RuleNumberSchema = z.number().int().min(1).max(32766);
const PortSchema = z.number().int().min(0).max(65535);

const RuleFieldsSchema = z.object({
  key: z.string().min(1).optional(),
  rule_number: RuleNumberSchema,
  type: z.enum(["ingress", "egress"]),
  protocol: z.union([z.string().min(1), z.number().int()]).transform((p) => normalizeProtocol(String(p))),
  action: z.enum(["allow", "deny"]),
  from_port: PortSchema.optional(),
  to_port: PortSchema.optional(),
  icmp_type: z.number().int().min(-1).max(255).optional(),
  icmp_code: z.number().int().min(-1).max(255).optional(),
  description: z.string().optional(),
});

type RuleFieldsOutput = z.infer<typeof RuleFieldsSchema>;

const checkRuleFields = (rule: RuleFieldsOutput, ctx: z.RefinementCtx): void => {
  if (isPortedProtocol(rule.protocol)) {
    for (const field of ["from_port", "to_port"] as const) {
      if (rule[field] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [field],
          message: `${field} is required for protocol "${rule.protocol}"`,
        });
      }
    }
  }
  if (rule.from_port !== undefined && rule.to_port !== undefined && rule.from_port > rule.to_port) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["from_port"],
      message: `from_port ${rule.from_port} is greater than to_port ${rule.to_port}`,
    });
  }
  if ((rule.icmp_type !== undefined || rule.icmp_code !== undefined) && !isIcmpProtocol(rule.protocol)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["icmp_type"],
      message: `icmp_type and icmp_code only apply to icmp (1) or icmpv6 (58) rules, not protocol "${rule.protocol}"`,
    });
  }
};

export const RuleSpecSchema = RuleFieldsSchema.extend({
  cidr_block: Ipv4CidrSchema.optional(),
  ipv6_cidr_block: Ipv6CidrSchema.optional(),
}).strict().superRefine((rule, ctx) => {
  checkRuleFields(rule, ctx);
  if ((rule.cidr_block === undefined) === (rule.ipv6_cidr_block === undefined)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["cidr_block"],
      message: "exactly one of cidr_block or ipv6_cidr_block must be set",
    });
  }
});

export const MatrixRuleSpecSchema = RuleFieldsSchema.strict().superRefine(checkRuleFields);

export const MatrixSubjectSchema = z.object({
  key: z.string().min(1).optional(),
  self: z.boolean().default(false),
  cidr_blocks: z.array(Ipv4CidrSchema).default([]),
  ipv6_cidr_blocks: z.array(Ipv6CidrSchema).default([]),
  prefix_list_ids: z.array(z.string().startsWith("pl-")).default([]),
  rules: z.array(MatrixRuleSpecSchema).default([]),
}).strict();

export const NaclModuleConfigSchema = z.object({
  enabled: z.boolean().default(true),
  name: z.string().min(1).default("nacl"),
  tags: z.record(z.string()).default({}),
  region: z.string().min(1).optional(),
  vpc_id: z.string().min(1).optional(),
  subnet_ids: z.array(z.string().min(1)).default([]),
  rules: z.array(RuleSpecSchema).default([]),
  rules_map: z.record(z.array(RuleSpecSchema)).default({}),
  rule_matrix: z.array(MatrixSubjectSchema).default([]),
  target_network_acl_id: z.array(z.string()).max(1, "at most one external network ACL id may be given").default([]),
  network_acl_name: z.array(z.string().min(1)).max(1, "at most one network ACL name may be given").default([]),
  create_before_destroy: z.boolean().default(true),
  preserve_network_acl_id: z.boolean().default(false),
  allow_all_egress: z.boolean().default(true),
  allow_all_egress_rule_number: RuleNumberSchema.default(100),
  inline_rules_enabled: z.boolean().default(false),
  network_acl_create_timeout: DurationSchema.default("10m"),
  network_acl_delete_timeout: DurationSchema.default("15m"),
}).strict().superRefine((config, ctx) => {
  if (config.enabled && config.vpc_id === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["vpc_id"],
      message: "vpc_id is required when the module is enabled",
    });
  }
});

export const FingerprintSchema = z.object({
  digest: z.string().regex(/^[0-9a-f]{64}$/),
  salt: z.string().regex(/^[0-9a-f]{8}$/),
});

// Export types
export type RuleSpec = z.infer<typeof RuleSpecSchema>;
export type MatrixRuleSpec = z.infer<typeof MatrixRuleSpecSchema>;
export type MatrixSubjectSpec = z.infer<typeof MatrixSubjectSchema>;
export type NaclModuleConfig = z.infer<typeof NaclModuleConfigSchema>;
export type NaclModuleInput = z.input<typeof NaclModuleConfigSchema>;
export type Fingerprint = z.infer<typeof FingerprintSchema>;

// Validation helpers
export const validateConfig = (data: unknown): NaclModuleConfig => {
  return NaclModuleConfigSchema.parse(data);
};

export const validateConfigSafe = (data: unknown) => {
  return NaclModuleConfigSchema.safeParse(data);
};

export const formatIssues = (error: z.ZodError): string[] => {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "root";
    return `${path}: ${issue.message}`;
  });
};
