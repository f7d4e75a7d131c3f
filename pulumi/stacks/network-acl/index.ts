import * as pulumi from "@pulumi/pulumi";
import { NetworkAclModule } from "../../../src/core/network-acl";
import { FingerprintSchema, validateConfig } from "../../../src/types/schemas";

const config = new pulumi.Config();
const naclConfig = validateConfig(config.requireObject<unknown>("nacl"));

// Set from the `fingerprint` output of the last update to keep the ACL name stable.
const previousFingerprint = FingerprintSchema.optional().parse(config.getObject<unknown>("previousFingerprint"));

const nacl = new NetworkAclModule(naclConfig.name, { config: naclConfig, previousFingerprint });

export const networkAclId = nacl.networkAclId;
export const networkAclArn = nacl.networkAclArn;
export const networkAclName = nacl.networkAclName;
export const ruleIds = nacl.ruleIds;
export const fingerprint = nacl.fingerprint;
