// Connection lifecycle state

export type ConnectionState =
  | { status: 'disconnected' }
  | { status: 'connecting' }
  | { status: 'connected' }
  | { status: 'failed'; reason: string };

export type ConnectionStatus = ConnectionState['status'];

export const DISCONNECTED: ConnectionState = { status: 'disconnected' };
export const CONNECTING: ConnectionState = { status: 'connecting' };
export const CONNECTED: ConnectionState = { status: 'connected' };

export function failed(reason: string): ConnectionState {
  return { status: 'failed', reason };
}

export function connectionStatesEqual(a: ConnectionState, b: ConnectionState): boolean {
  if (a.status === 'failed' && b.status === 'failed') {
    return a.reason === b.reason;
  }
  return a.status === b.status;
}

export function describeConnectionState(state: ConnectionState): string {
  return state.status === 'failed' ? `failed (${state.reason})` : state.status;
}
