import { describe, it, expect } from "vitest";
import { resolveAclVariant, rotationSuffix, selectAcl } from "../src/core/acl-selection";
import { ConfigurationError } from "../src/core/errors";
import { moduleConfig, TEST_VPC_ID } from "./helpers";

describe("resolveAclVariant", () => {
  it("replaces the whole ACL on rule changes by default", () => {
    expect(resolveAclVariant(moduleConfig())).toEqual({ kind: "create-before-destroy", ruleReplacement: "new-acl" });
  });

  it("edits rules in place when the ACL id must be preserved", () => {
    expect(resolveAclVariant(moduleConfig({ preserve_network_acl_id: true }))).toEqual({
      kind: "create-before-destroy",
      ruleReplacement: "in-place",
    });
  });

  it("uses destroy-before-create without create_before_destroy", () => {
    expect(resolveAclVariant(moduleConfig({ create_before_destroy: false }))).toEqual({
      kind: "destroy-before-create",
      ruleReplacement: "in-place",
    });
    expect(resolveAclVariant(moduleConfig({ create_before_destroy: false, preserve_network_acl_id: true }))).toEqual({
      kind: "destroy-before-create",
      ruleReplacement: "in-place",
    });
  });

  it("attaches to an external ACL when one is given", () => {
    expect(resolveAclVariant(moduleConfig({ target_network_acl_id: ["acl-0external"] }))).toEqual({
      kind: "external",
      networkAclId: "acl-0external",
      ruleReplacement: "in-place",
    });
  });

  it("rejects an empty external ACL id", () => {
    const config = moduleConfig({ target_network_acl_id: ["  "] });

    expect(() => resolveAclVariant(config)).toThrow(ConfigurationError);
    expect(() => resolveAclVariant(config)).toThrow(
      "target_network_acl_id[0]: the external network ACL id is empty; remove the entry to create a network ACL instead"
    );
  });
});

describe("rotationSuffix", () => {
  const fingerprint = { digest: "c".repeat(64), salt: "12345678" };

  it("is the salt only when rule changes create a new ACL", () => {
    expect(rotationSuffix({ kind: "create-before-destroy", ruleReplacement: "new-acl" }, fingerprint)).toBe("12345678");
    expect(rotationSuffix({ kind: "create-before-destroy", ruleReplacement: "in-place" }, fingerprint)).toBeUndefined();
    expect(rotationSuffix({ kind: "destroy-before-create", ruleReplacement: "in-place" }, fingerprint)).toBeUndefined();
  });
});

describe("selectAcl", () => {
  it("describes a managed ACL with the suffixed name", () => {
    const config = moduleConfig({ name: "app", tags: { Team: "net" }, subnet_ids: ["subnet-1"] });

    expect(selectAcl(config, resolveAclVariant(config), "abcd1234")).toEqual({
      kind: "managed",
      lifecycle: "create-before-destroy",
      logicalName: "acl-abcd1234",
      name: "app-abcd1234",
      tags: { Team: "net", Name: "app-abcd1234" },
      vpcId: TEST_VPC_ID,
      subnetIds: ["subnet-1"],
    });
  });

  it("prefers network_acl_name over the module name", () => {
    const config = moduleConfig({ name: "app", network_acl_name: ["edge"], create_before_destroy: false });

    expect(selectAcl(config, resolveAclVariant(config))).toMatchObject({
      kind: "managed",
      lifecycle: "destroy-before-create",
      logicalName: "acl",
      name: "edge",
      tags: { Name: "edge" },
    });
  });

  it("only carries the id of an external ACL", () => {
    const config = moduleConfig({ target_network_acl_id: ["acl-0external"], name: "ignored" });

    expect(selectAcl(config, resolveAclVariant(config), "abcd1234")).toEqual({
      kind: "external",
      networkAclId: "acl-0external",
    });
  });
});
