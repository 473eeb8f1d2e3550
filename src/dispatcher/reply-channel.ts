export interface ReplySender<T> {
  /** Delivers the value. False if already sent or the receiver is gone. */
  send(value: T): boolean;
  readonly closed: boolean;
}

export interface ReplyReceiver<T> {
  /**
   * Waits for the value. If `signal` aborts first the receiver is abandoned
   * and the promise rejects with the signal's reason.
   */
  receive(signal?: AbortSignal): Promise<T>;
  abandon(): void;
  readonly abandoned: boolean;
}

interface ChannelState<T> {
  sent: boolean;
  abandoned: boolean;
  resolve: (value: T) => void;
  value: Promise<T>;
}

/**
 * One-slot, single-use reply path between a worker and the caller that
 * submitted the request.
 */
export function createReplyChannel<T>(): [ReplySender<T>, ReplyReceiver<T>] {
  let resolveValue: (value: T) => void = () => {};
  const value = new Promise<T>((resolve) => {
    resolveValue = resolve;
  });
  const state: ChannelState<T> = {
    sent: false,
    abandoned: false,
    resolve: resolveValue,
    value,
  };

  const sender: ReplySender<T> = {
    send: (reply) => {
      if (state.sent || state.abandoned) return false;
      state.sent = true;
      state.resolve(reply);
      return true;
    },
    get closed() {
      return state.sent || state.abandoned;
    },
  };

  const receiver: ReplyReceiver<T> = {
    receive: (signal) => receiveUnlessAbandoned(state, signal),
    abandon: () => {
      if (state.sent) return;
      state.abandoned = true;
    },
    get abandoned() {
      return state.abandoned;
    },
  };

  return [sender, receiver];
}

function receiveUnlessAbandoned<T>(
  state: ChannelState<T>,
  signal: AbortSignal | undefined
): Promise<T> {
  if (!signal) return state.value;
  if (signal.aborted && !state.sent) {
    state.abandoned = true;
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      if (state.sent) return;
      state.abandoned = true;
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    void state.value.then((reply) => {
      signal.removeEventListener('abort', onAbort);
      resolve(reply);
    });
  });
}
