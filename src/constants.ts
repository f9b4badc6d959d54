// BLE UART-emulation modules (HM-10, BT-05, AT-09) expose a serial link on
// service 0xFFE0, characteristic 0xFFE1. Vendors ship variants of the full
// 128-bit UUID, so these are matched as substrings.
export const GATT_UART_SERVICE_FRAGMENT = 'ffe0';
export const GATT_UART_CHARACTERISTIC_FRAGMENT = 'ffe1';

/**
 * Case-insensitive substring match of a UUID fragment.
 * Works for short ids ('ffe0'), full UUIDs and UUIDs without dashes.
 */
export function uuidContains(uuid: string, fragment: string): boolean {
  if (fragment.length === 0) return false;
  return uuid.toLowerCase().includes(fragment.toLowerCase());
}

/** Appended to every outgoing command by both transports. */
export const LINE_TERMINATOR = '\r\n';

// Controller tokens
export const TOKEN_RATE_ACK = 'ST';
export const TOKEN_COIN = '$';
export const TOKEN_PAYMENT_COMPLETE = 'P';

/**
 * The controller never sends a legitimate token longer than two bytes,
 * so anything piling up past this length is garbage.
 */
export const PROTOCOL_BUFFER_CEILING = 50;

/** Monetary value of one coin token. */
export const COIN_DENOMINATION = 5;

export const TICKET_MIN_COINS = 1;
export const TICKET_MAX_COINS = 9;
export const TICKET_MAX_ID = 9998;
export const TICKET_ID_PREFIX = 'TICKET-ID-';
export const TICKET_PRICE_KEY = 'PRECIO:';
export const TICKET_FIELD_SEPARATOR = '|';

/**
 * Active BLE scan window. Classic devices are not scanned for; they come
 * from the OS list of bonded devices.
 */
export const BLE_SCAN_TIMEOUT_MS = 10000;

/** How long to wait for the local adapter to power on before scanning. */
export const BLE_POWER_ON_TIMEOUT_MS = 10000;

/** Bound on establishing the physical link. */
export const BLE_CONNECTION_TIMEOUT_MS = 15000;

/**
 * Timeout for starting BLE notifications.
 * Some modules take a while to set up notifications, but if it takes
 * longer than 15 seconds something is wrong.
 */
export const BLE_NOTIFICATION_TIMEOUT_MS = 15000;

/**
 * Timeout for BLE write operations.
 * BLE writes can hang indefinitely if the module disconnects or becomes
 * unresponsive.
 */
export const BLE_WRITE_TIMEOUT_MS = 10000;

/** HC-05/HC-06 modules ship configured for 9600 baud. */
export const SPP_DEFAULT_BAUD_RATE = 9600;

/** Display name for a bonded serial port the OS gives no name. */
export const CLASSIC_FALLBACK_NAME = 'HC-05/06';
