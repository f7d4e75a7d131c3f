import * as pulumi from "@pulumi/pulumi";

/**
 * Collects the resources that must exist before an ACL is put in service.
 * Whatever wires the ACL to subnets depends on `dependencies`; `ready`
 * resolves once every member has been created and has an id.
 */
export class CompletionBarrier {
  private readonly members: pulumi.CustomResource[] = [];

  add(...resources: pulumi.CustomResource[]): this {
    this.members.push(...resources);
    return this;
  }

  get dependencies(): pulumi.CustomResource[] {
    return [...this.members];
  }

  get size(): number {
    return this.members.length;
  }

  ready(): pulumi.Output<boolean> {
    return pulumi.all(this.members.map((member) => member.id)).apply(() => true);
  }
}
