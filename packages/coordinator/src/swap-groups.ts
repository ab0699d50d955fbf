/**
 * Swap Group Tracker — bounded sets of co-dependent records.
 *
 * Rules:
 * - At most `maxGroupSize` members; a record joins at most one group
 * - Only BUFFERED records join
 * - A group is complete once every member is READY; complete groups are sealed
 * - expireGroup fails every live member at once; expired groups are sealed
 * - Members of a group may only be executed once the group is complete
 */

import type { RecordStore } from "@meridian/store";
import type {
  Hex32,
  SwapGroup,
  SwapGroupSummary,
  TransactionRecord,
} from "@meridian/types";
import type { CircuitBreaker } from "./circuit-breaker.js";
import type { ConfigSource } from "./config.js";
import type { OperationContext } from "./context.js";
import { CoordinationError } from "./errors.js";
import { reportFailure } from "./failures.js";
import { isLive, toExpired } from "./lifecycle.js";

export class SwapGroupTracker {
  private readonly store: RecordStore;
  private readonly breaker: CircuitBreaker;
  private readonly config: ConfigSource;

  constructor(store: RecordStore, breaker: CircuitBreaker, config: ConfigSource) {
    this.store = store;
    this.breaker = breaker;
    this.config = config;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Membership
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Reject if `groupId` cannot take another member.
   * An unknown group can always be joined; joining creates it.
   */
  assertCanJoin(groupId: Hex32): void {
    const group = this.store.getGroup(groupId);
    if (group === undefined) return;

    if (group.status !== "open") {
      throw new CoordinationError(
        "STATE_ERROR",
        `Swap group '${groupId}' is ${group.status} and sealed`,
        { groupId, status: group.status },
      );
    }
    const max = this.config().maxGroupSize;
    if (group.members.length >= max) {
      throw new CoordinationError(
        "STATE_ERROR",
        `Swap group '${groupId}' already has ${max} members`,
        { groupId, size: group.members.length },
      );
    }
  }

  /**
   * Record `memberId` as a member. The caller has already checked
   * assertCanJoin and stored the member with its swapGroupId set.
   */
  join(ctx: OperationContext, groupId: Hex32, memberId: Hex32): SwapGroup {
    const existing = this.store.getGroup(groupId);

    if (existing === undefined) {
      const created: SwapGroup = {
        id: groupId,
        members: [memberId],
        readyCount: 0,
        status: "open",
        createdAt: ctx.time,
      };
      this.store.putGroup(created);
      ctx.emit({
        type: "GroupCreated",
        payload: { groupId, firstMember: memberId },
      });
      return created;
    }

    const updated: SwapGroup = {
      ...existing,
      members: [...existing.members, memberId],
    };
    this.store.putGroup(updated);
    ctx.emit({
      type: "GroupMemberAdded",
      payload: { groupId, id: memberId, size: updated.members.length },
    });
    return updated;
  }

  /**
   * Add an existing BUFFERED, ungrouped record to a group.
   */
  addToGroup(ctx: OperationContext, record: TransactionRecord, groupId: Hex32): SwapGroup {
    if (record.state.tag !== "BUFFERED") {
      throw new CoordinationError(
        "STATE_ERROR",
        `Transaction '${record.id}' is ${record.state.tag}; only BUFFERED records join groups`,
        { id: record.id, state: record.state.tag },
      );
    }
    if (record.swapGroupId !== undefined) {
      throw new CoordinationError(
        "STATE_ERROR",
        `Transaction '${record.id}' already belongs to group '${record.swapGroupId}'`,
        { id: record.id, groupId: record.swapGroupId },
      );
    }
    this.assertCanJoin(groupId);

    this.store.putRecord({ ...record, swapGroupId: groupId });
    return this.join(ctx, groupId, record.id);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Member transitions
  // ───────────────────────────────────────────────────────────────────────

  /** A member reached READY. Completes the group when it was the last. */
  memberReady(ctx: OperationContext, groupId: Hex32): void {
    const group = this.store.getGroup(groupId);
    if (group === undefined || group.status !== "open") return;

    const readyCount = group.readyCount + 1;
    const complete = readyCount === group.members.length;
    this.store.putGroup({
      ...group,
      readyCount,
      status: complete ? "complete" : "open",
    });

    if (complete) {
      ctx.emit({
        type: "GroupCompleted",
        payload: { groupId, members: group.members },
      });
    }
  }

  /** A READY member of an open group left READY without executing. */
  memberUnready(groupId: Hex32): void {
    const group = this.store.getGroup(groupId);
    if (group === undefined || group.status !== "open" || group.readyCount === 0) {
      return;
    }
    this.store.putGroup({ ...group, readyCount: group.readyCount - 1 });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Collective failure
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Force every live member to EXPIRED once any member is past expiry.
   *
   * @returns ids of the members this call expired
   */
  expireGroup(ctx: OperationContext, groupId: Hex32): readonly Hex32[] {
    const group = this.requireGroup(groupId);

    if (group.status !== "open") {
      throw new CoordinationError(
        "STATE_ERROR",
        `Swap group '${groupId}' is already ${group.status}`,
        { groupId, status: group.status },
      );
    }

    const members = this.loadMembers(group);
    const lagging = members.find((m) => ctx.time > m.expiry);
    if (lagging === undefined) {
      throw new CoordinationError(
        "TIMING_ERROR",
        `No member of swap group '${groupId}' is past expiry`,
        { groupId },
      );
    }

    const expired: Hex32[] = [];
    for (const member of members) {
      if (!isLive(member.state.tag)) continue;

      this.store.putRecord({
        ...member,
        state: toExpired(member.state, ctx.time, "swap group expired"),
      });
      expired.push(member.id);
      ctx.emit({ type: "Expired", payload: { id: member.id } });
      reportFailure(
        ctx,
        this.breaker,
        member.id,
        "GROUP_EXPIRED",
        `Swap group '${groupId}' expired: member '${lagging.id}' passed expiry`,
      );
    }

    this.store.putGroup({ ...group, status: "expired" });
    ctx.emit({
      type: "GroupExpired",
      payload: { groupId, expiredMembers: expired },
    });
    return expired;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  status(groupId: Hex32): SwapGroupSummary {
    const group = this.store.getGroup(groupId);
    if (group === undefined) {
      return { size: 0, readyCount: 0, allReady: false };
    }
    return {
      size: group.members.length,
      readyCount: group.readyCount,
      allReady: group.status === "complete",
    };
  }

  get(groupId: Hex32): SwapGroup | undefined {
    return this.store.getGroup(groupId);
  }

  /**
   * Whether a READY record may be handed to settlement: ungrouped
   * records always, grouped ones only once their group is complete.
   */
  isSettleable(record: TransactionRecord): boolean {
    if (record.swapGroupId === undefined) return true;
    return this.store.getGroup(record.swapGroupId)?.status === "complete";
  }

  requireGroup(groupId: Hex32): SwapGroup {
    const group = this.store.getGroup(groupId);
    if (group === undefined) {
      throw new CoordinationError(
        "STATE_ERROR",
        `Swap group '${groupId}' not found`,
        { groupId },
      );
    }
    return group;
  }

  private loadMembers(group: SwapGroup): TransactionRecord[] {
    const members: TransactionRecord[] = [];
    for (const id of group.members) {
      const record = this.store.getRecord(id);
      if (record !== undefined) {
        members.push(record);
      }
    }
    return members;
  }
}
