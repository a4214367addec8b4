/**
 * Wire-level constants of the IQFeed lookup and streaming-bar protocol.
 */

/** Protocol version negotiated on connect */
export const PROTOCOL_VERSION = '6.1';

/** Idle read timeout of the read loop */
export const IDLE_TIMEOUT_MS = 4000;

/** Default per-request deadline of history requests */
export const DEFAULT_REQUEST_TIMEOUT_SECONDS = 30;

export const LINE_TERMINATOR = '\r\n';
export const FIELD_SEPARATOR = ',';

// System messages
export const SYSTEM_MESSAGE = 'S';
export const CURRENT_PROTOCOL = 'CURRENT PROTOCOL';
export const SERVER_CONNECTED = 'SERVER CONNECTED';
export const SET_PROTOCOL = 'SET PROTOCOL';
export const SET_PROTOCOL_COMMAND = `${SYSTEM_MESSAGE},${SET_PROTOCOL},${PROTOCOL_VERSION}`;
export const CONNECT = 'CONNECT';
export const DISCONNECT = 'DISCONNECT';
export const DISCONNECT_COMMAND = `${SYSTEM_MESSAGE},${DISCONNECT}`;
export const SERVER_CONNECTED_MESSAGE = `${SYSTEM_MESSAGE},${SERVER_CONNECTED}`;

// Request result sentinels
export const END_MSG = '!ENDMSG!';
export const NO_DATA = '!NO_DATA!';
export const ERROR_MARKER = 'E';

// Streaming bar tags
export const HISTORY_BAR = 'BH';
export const LIVE_BAR = 'BC';
export const NO_DATA_PUSH = 'n';
export const WATCH_COMMAND = 'BW';
export const UNWATCH_COMMAND = 'BR';

// Request id prefixes
export const HISTORY_BARS_PREFIX = 'H_';
export const DAILY_BARS_PREFIX = 'D_';

/** Digits of the numeric part of a request id */
export const REQUEST_NUMBER_WIDTH = 10;

/** Largest random offset added to the request counter */
export const REQUEST_JITTER = 100;
