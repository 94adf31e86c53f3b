import { createHash } from "node:crypto";

export type MemberRecord = {
  emailAddress: string;
  // Mailing-list status: subscribed | pending | unsubscribed | cleaned | ...
  status: string;
  mergeFields: Record<string, unknown>;
};

export type MemberLookup =
  | { outcome: "found"; member: MemberRecord }
  | { outcome: "not_found" }
  | { outcome: "failed"; status: number; detail: string };

export interface MemberDirectory {
  lookup(email: string): Promise<MemberLookup>;
}

/** Members are keyed by the MD5 of the lower-cased address. */
export function memberKey(email: string): string {
  return createHash("md5").update(email.toLowerCase()).digest("hex");
}

export class MemoryMemberDirectory implements MemberDirectory {
  private members = new Map<string, MemberRecord>();
  private failure: { status: number; detail: string } | null = null;

  put(member: MemberRecord): void {
    this.members.set(memberKey(member.emailAddress), member);
  }

  // Makes every lookup fail, the way an upstream error would.
  failWith(status: number, detail: string): void {
    this.failure = { status, detail };
  }

  async lookup(email: string): Promise<MemberLookup> {
    if (this.failure) {
      return { outcome: "failed", ...this.failure };
    }
    const member = this.members.get(memberKey(email));
    return member ? { outcome: "found", member } : { outcome: "not_found" };
  }
}
