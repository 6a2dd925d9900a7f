import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import type {
  ChanopEvent,
  ChanopEventHandler,
  ChanopEventKind,
  ChanopEventSource,
  SubscriptionHandle,
} from "./types.js";

type HandlerTable = {
  [K in ChanopEventKind]: Map<number, ChanopEventHandler<K>>;
};

export type ChanopEventBus = ChanopEventSource & {
  emit: (event: ChanopEvent) => void;
  listenerCount: (kind?: ChanopEventKind) => number;
  clear: () => void;
};

function createHandlerTable(): HandlerTable {
  return {
    join: new Map(),
    part: new Map(),
    quit: new Map(),
    nick: new Map(),
    mode: new Map(),
    maskListEntry: new Map(),
    maskListEnd: new Map(),
    isupport: new Map(),
    connected: new Map(),
  };
}

/**
 * In-process subscription layer: an explicit table of event kind → handlers.
 * Hosts decode their protocol events and `emit` them here.
 */
export function createChanopEventBus(params: { logger?: SubsystemLogger } = {}): ChanopEventBus {
  const log = params.logger ?? createSubsystemLogger("chanop/events");
  const table = createHandlerTable();
  let nextId = 1;

  const dispatch = <E extends ChanopEvent>(
    handlers: Map<number, (event: E) => void>,
    event: E,
  ) => {
    for (const [id, handler] of [...handlers]) {
      // A handler may unsubscribe others while we iterate.
      if (!handlers.has(id)) {
        continue;
      }
      try {
        handler(event);
      } catch (err) {
        log.error(`${event.kind} handler failed: ${String(err)}`, { server: event.server });
      }
    }
  };

  return {
    subscribe: (kind, handler) => {
      const id = nextId++;
      table[kind].set(id, handler);
      return { id, kind };
    },
    unsubscribe: (handle) => {
      table[handle.kind].delete(handle.id);
    },
    emit: (event) => {
      switch (event.kind) {
        case "join":
          return dispatch(table.join, event);
        case "part":
          return dispatch(table.part, event);
        case "quit":
          return dispatch(table.quit, event);
        case "nick":
          return dispatch(table.nick, event);
        case "mode":
          return dispatch(table.mode, event);
        case "maskListEntry":
          return dispatch(table.maskListEntry, event);
        case "maskListEnd":
          return dispatch(table.maskListEnd, event);
        case "isupport":
          return dispatch(table.isupport, event);
        case "connected":
          return dispatch(table.connected, event);
      }
    },
    listenerCount: (kind) => {
      if (kind) {
        return table[kind].size;
      }
      return Object.values(table).reduce((total, handlers) => total + handlers.size, 0);
    },
    clear: () => {
      for (const handlers of Object.values(table)) {
        handlers.clear();
      }
    },
  };
}
