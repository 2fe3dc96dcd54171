import { SlackApiError } from "../errors";
import { logger } from "../logger";
import type { RtmStartResponse, SlackApi } from "./api/types";

/** im.open errors for users that simply cannot have a DM session. */
const SKIPPABLE_IM_ERRORS = new Set(["cannot_dm_bot", "user_disabled"]);

class BiMap {
  private readonly forward = new Map<string, string>();
  private readonly backward = new Map<string, string>();

  set(key: string, value: string): void {
    this.forward.set(key, value);
    this.backward.set(value, key);
  }

  get(key: string): string | undefined {
    return this.forward.get(key);
  }

  reverse(value: string): string | undefined {
    return this.backward.get(value);
  }

  values(): string[] {
    return Array.from(this.forward.values());
  }
}

/**
 * Name/id lookups for one connection. Ids seen in the snapshot or in a join
 * event stay resolvable until the connection is replaced.
 */
export class IdentityMap {
  private readonly channels = new BiMap(); // name -> id
  private readonly users = new BiMap(); // name -> id
  private readonly displayNames = new BiMap(); // display name -> id
  private readonly dms = new BiMap(); // user id -> dm id

  constructor(snapshot?: Pick<RtmStartResponse, "channels" | "groups" | "users">) {
    for (const channel of [...(snapshot?.channels ?? []), ...(snapshot?.groups ?? [])]) {
      this.addChannel(channel.name, channel.id);
    }
    for (const user of snapshot?.users ?? []) {
      this.addUser(user.name, user.id, user.profile?.display_name_normalized);
    }
  }

  /** Builds the map from an rtm.start snapshot and opens a DM session per user. */
  static async build(api: SlackApi, snapshot: RtmStartResponse): Promise<IdentityMap> {
    const ids = new IdentityMap(snapshot);
    for (const userId of ids.userIds()) {
      const result = await api.openIm(userId);
      if (result.ok) {
        ids.addDm(userId, result.channelId);
        continue;
      }
      if (SKIPPABLE_IM_ERRORS.has(result.error)) {
        continue;
      }
      throw new SlackApiError("im.open", result.error);
    }
    logger.info(
      {
        channels: ids.channelIds().length,
        users: ids.userIds().length,
        dms: ids.dmIds().length,
      },
      "Identity map built",
    );
    return ids;
  }

  addChannel(name: string, id: string): void {
    this.channels.set(name, id);
  }

  addUser(name: string, id: string, displayName?: string): void {
    this.users.set(name, id);
    if (displayName) {
      this.displayNames.set(displayName, id);
    }
  }

  addDm(userId: string, dmId: string): void {
    this.dms.set(userId, dmId);
  }

  channelId(name: string): string | undefined {
    return this.channels.get(name);
  }

  channelName(id: string): string | undefined {
    return this.channels.reverse(id);
  }

  userId(name: string): string | undefined {
    return this.users.get(name);
  }

  userName(id: string): string | undefined {
    return this.users.reverse(id);
  }

  displayName(userId: string): string | undefined {
    return this.displayNames.reverse(userId);
  }

  dmId(userId: string): string | undefined {
    return this.dms.get(userId);
  }

  dmUser(dmId: string): string | undefined {
    return this.dms.reverse(dmId);
  }

  /** Channel and private group ids. */
  channelIds(): string[] {
    return this.channels.values();
  }

  userIds(): string[] {
    return this.users.values();
  }

  dmIds(): string[] {
    return this.dms.values();
  }
}

export function isDirectMessageChannel(channelId: string): boolean {
  return channelId.startsWith("D");
}
