import type { FilteredHandler, UnfilteredHandler } from "./types";

interface ChannelRestricted {
  channels: ReadonlySet<string> | null;
}

export function acceptsChannel(handler: ChannelRestricted, channelName: string | null): boolean {
  if (handler.channels === null) {
    return true;
  }
  return channelName !== null && handler.channels.has(channelName);
}

function describeChannels(channels: ReadonlySet<string> | null): string {
  return channels === null ? "All" : Array.from(channels).join(", ");
}

export class HandlerRegistry {
  private filtered: Map<string, FilteredHandler> = new Map();
  private unfiltered: UnfilteredHandler[] = [];

  register(
    ...[handler, unfiltered]: [FilteredHandler, false] | [UnfilteredHandler, true]
  ): void {
    if (unfiltered) {
      this.unfiltered.push(handler);
      return;
    }
    this.filtered.set(handler.name, handler);
  }

  registerFiltered(handler: FilteredHandler): void {
    this.register(handler, false);
  }

  registerUnfiltered(handler: UnfilteredHandler): void {
    this.register(handler, true);
  }

  lookupFiltered(name: string): FilteredHandler | undefined {
    return this.filtered.get(name);
  }

  filteredHandlers(): FilteredHandler[] {
    return Array.from(this.filtered.values());
  }

  unfilteredHandlers(): readonly UnfilteredHandler[] {
    return this.unfiltered;
  }

  helpText(requesterIsAdmin: boolean): string {
    const lines: string[] = [];
    for (const handler of this.filtered.values()) {
      if (!handler.doc || (handler.adminOnly && !requesterIsAdmin)) {
        continue;
      }
      lines.push(`${handler.name}:`);
      lines.push(`\t${handler.doc}`);
      lines.push(`\tAllowed channels: ${describeChannels(handler.channels)}`);
    }
    return lines.join("\n");
  }
}
