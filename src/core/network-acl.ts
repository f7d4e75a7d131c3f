import * as pulumi from "@pulumi/pulumi";
import * as aws from "@pulumi/aws";
import { CompletionBarrier } from "./barrier";
import { ConfigurationError } from "./errors";
import { isIcmpProtocol } from "./protocol";
import { associationLogicalName, buildNaclPlan, ruleLogicalName, type EnabledPlan, type NaclPlan } from "./planner";
import { ErrorHandler, ErrorLevel } from "../logging/error-handler";
import type { Fingerprint, NaclModuleConfig } from "../types/schemas";
import type { ResolvedRule, RuleTarget } from "../types/rules";

export interface NetworkAclModuleArgs {
  config: NaclModuleConfig;
  /** Fingerprint exported by the previous update of this stack, if any. */
  previousFingerprint?: Fingerprint;
  logger?: ErrorHandler;
}

interface ResolvedAddress {
  cidrBlock?: pulumi.Input<string>;
  ipv6CidrBlock?: pulumi.Input<string>;
}

type InlineEntry = aws.types.input.ec2.NetworkAclIngress;

/** Turns rule targets into the address fields AWS takes, looking up self and prefix lists. */
class TargetResolver {
  private vpcCidr?: pulumi.Output<string>;

  constructor(
    private readonly vpcId: string | undefined,
    private readonly parent: pulumi.Resource
  ) {}

  resolve(rule: ResolvedRule): ResolvedAddress {
    const target: RuleTarget = rule.target;
    switch (target.kind) {
      case "cidr":
        return { cidrBlock: target.cidrBlock };
      case "ipv6":
        return { ipv6CidrBlock: target.ipv6CidrBlock };
      case "self":
        return { cidrBlock: this.selfCidr(rule) };
      case "prefix-list":
        return { cidrBlock: this.prefixListCidr(target.prefixListId, rule) };
    }
  }

  private selfCidr(rule: ResolvedRule): pulumi.Output<string> {
    if (this.vpcId === undefined) {
      throw new ConfigurationError(rule.source, "a self target needs vpc_id to look up the VPC CIDR block");
    }
    if (!this.vpcCidr) {
      this.vpcCidr = aws.ec2.getVpcOutput({ id: this.vpcId }, { parent: this.parent }).cidrBlock;
    }
    return this.vpcCidr;
  }

  // A network ACL entry holds one address, so the prefix list must hold exactly one IPv4 entry.
  private prefixListCidr(prefixListId: string, rule: ResolvedRule): pulumi.Output<string> {
    return aws.ec2
      .getManagedPrefixListOutput({ id: prefixListId }, { parent: this.parent })
      .entries.apply((entries) => {
        if (entries.length !== 1 || entries[0].cidr.includes(":")) {
          throw new ConfigurationError(
            rule.source,
            `prefix list ${prefixListId} must hold exactly one IPv4 entry to back rule "${rule.key}", found ${entries.length} entries`
          );
        }
        return entries[0].cidr;
      });
  }
}

function icmpFields(rule: ResolvedRule): { icmpType?: number; icmpCode?: number } {
  if (!isIcmpProtocol(rule.protocol)) {
    return {};
  }
  // AWS needs both for ICMP entries; -1 matches every type or code.
  return { icmpType: rule.icmpType ?? -1, icmpCode: rule.icmpCode ?? -1 };
}

export class NetworkAclModule extends pulumi.ComponentResource {
  public readonly plan: NaclPlan;
  public readonly acl?: aws.ec2.NetworkAcl;
  public readonly rules: aws.ec2.NetworkAclRule[];
  public readonly associations: aws.ec2.NetworkAclAssociation[];

  public readonly networkAclId: pulumi.Output<string | undefined>;
  public readonly networkAclArn: pulumi.Output<string | undefined>;
  public readonly networkAclName: pulumi.Output<string | undefined>;
  public readonly ruleIds: pulumi.Output<string[]>;
  public readonly rulesReady: pulumi.Output<boolean>;
  public readonly fingerprint: pulumi.Output<Fingerprint | undefined>;

  constructor(name: string, args: NetworkAclModuleArgs, opts?: pulumi.ComponentResourceOptions) {
    super("nacl:index:NetworkAclModule", name, {}, opts);

    const logger = args.logger ?? new ErrorHandler();
    this.plan = buildNaclPlan(args.config, args.previousFingerprint);

    if (!this.plan.enabled) {
      logger.log(ErrorLevel.INFO, `Network ACL module ${name} is disabled, nothing to declare`);
      this.rules = [];
      this.associations = [];
      this.networkAclId = pulumi.output<string | undefined>(undefined);
      this.networkAclArn = pulumi.output<string | undefined>(undefined);
      this.networkAclName = pulumi.output<string | undefined>(undefined);
      this.ruleIds = pulumi.output<string[]>([]);
      this.rulesReady = pulumi.output(true);
      this.fingerprint = pulumi.output<Fingerprint | undefined>(undefined);
      this.registerOutputs({});
      return;
    }

    const plan = this.plan;
    const resolver = new TargetResolver(args.config.vpc_id, this);
    const customTimeouts: pulumi.CustomTimeouts = { create: plan.timeouts.create, delete: plan.timeouts.delete };

    logger.log(
      ErrorLevel.INFO,
      `Planning network ACL ${name}: ${plan.variant.kind}, ${plan.mode} rules, ` +
        `${plan.mode === "inline" ? plan.rules.ingress.length + plan.rules.egress.length : plan.rules.keyed.size} rules`
    );
    if (plan.rotation) {
      logger.log(ErrorLevel.DEBUG, `Rule fingerprint ${plan.fingerprint.digest} uses name suffix ${plan.rotation}`);
    }

    if (plan.acl.kind === "managed") {
      const inlineEntry = (rule: ResolvedRule): InlineEntry => ({
        ruleNo: rule.ruleNumber,
        action: rule.action,
        protocol: rule.protocol,
        fromPort: rule.fromPort,
        toPort: rule.toPort,
        ...resolver.resolve(rule),
        ...icmpFields(rule),
      });

      this.acl = new aws.ec2.NetworkAcl(
        `${name}-${plan.acl.logicalName}`,
        {
          vpcId: plan.acl.vpcId,
          tags: plan.acl.tags,
          ingress: plan.mode === "inline" ? plan.rules.ingress.map(inlineEntry) : undefined,
          egress: plan.mode === "inline" ? plan.rules.egress.map(inlineEntry) : undefined,
        },
        {
          parent: this,
          deleteBeforeReplace: plan.acl.lifecycle === "destroy-before-create",
          customTimeouts,
        }
      );
    } else if (args.config.subnet_ids.length > 0) {
      logger.log(ErrorLevel.WARN, `subnet_ids are ignored when attaching rules to external network ACL ${plan.acl.networkAclId}`);
    }

    // The one id every rule refers to, derived from the variant only.
    const networkAclId: pulumi.Output<string> =
      plan.acl.kind === "external" ? pulumi.output(plan.acl.networkAclId) : this.requireAcl().id;

    this.rules = this.declareRules(name, plan, networkAclId, resolver, customTimeouts);

    const barrier = new CompletionBarrier();
    barrier.add(...(this.acl ? [this.acl] : []), ...this.rules);
    this.associations = this.declareAssociations(name, plan, networkAclId, barrier);

    this.networkAclId = networkAclId;
    this.networkAclArn = this.acl ? this.acl.arn : pulumi.output<string | undefined>(undefined);
    this.networkAclName = pulumi.output<string | undefined>(plan.acl.kind === "managed" ? plan.acl.name : undefined);
    this.ruleIds = pulumi.all(this.rules.map((rule) => rule.id));
    this.rulesReady = barrier.ready();
    this.fingerprint = pulumi.output<Fingerprint | undefined>(plan.fingerprint);

    this.registerOutputs({
      networkAclId: this.networkAclId,
      networkAclArn: this.networkAclArn,
      networkAclName: this.networkAclName,
      ruleIds: this.ruleIds,
      rulesReady: this.rulesReady,
      fingerprint: this.fingerprint,
    });
  }

  private requireAcl(): aws.ec2.NetworkAcl {
    if (!this.acl) {
      throw new Error("network ACL was not declared for a managed selection");
    }
    return this.acl;
  }

  private declareRules(
    name: string,
    plan: EnabledPlan,
    networkAclId: pulumi.Output<string>,
    resolver: TargetResolver,
    customTimeouts: pulumi.CustomTimeouts
  ): aws.ec2.NetworkAclRule[] {
    const rules: aws.ec2.NetworkAclRule[] = [];
    for (const [key, rule] of plan.rules.keyed) {
      rules.push(
        new aws.ec2.NetworkAclRule(
          `${name}-${ruleLogicalName(plan, key)}`,
          {
            networkAclId,
            ruleNumber: rule.ruleNumber,
            egress: rule.direction === "egress",
            protocol: rule.protocol,
            ruleAction: rule.action,
            fromPort: rule.fromPort,
            toPort: rule.toPort,
            ...resolver.resolve(rule),
            ...icmpFields(rule),
          },
          {
            parent: this,
            // Same number, same direction: the old entry has to go first. Self and
            // prefix-list targets can resolve to a new CIDR under an unchanged name.
            deleteBeforeReplace: true,
            customTimeouts,
          }
        )
      );
    }
    return rules;
  }

  private declareAssociations(
    name: string,
    plan: EnabledPlan,
    networkAclId: pulumi.Output<string>,
    barrier: CompletionBarrier
  ): aws.ec2.NetworkAclAssociation[] {
    if (plan.acl.kind !== "managed") {
      return [];
    }
    return plan.acl.subnetIds.map(
      (subnetId) =>
        new aws.ec2.NetworkAclAssociation(
          `${name}-${associationLogicalName(plan, subnetId)}`,
          { networkAclId, subnetId },
          { parent: this, dependsOn: barrier.dependencies }
        )
    );
  }
}
