/**
 * Heliotherm Constants
 * Centralized definitions for defaults and protocol values
 */

// Connection Defaults
export const DEFAULT_MODBUS_PORT = 502;        // Standard Modbus TCP port
export const DEFAULT_UNIT_ID = 1;              // Heat pump controller unit id
export const MIN_UNIT_ID = 0;
export const MAX_UNIT_ID = 247;                // Maximum valid Modbus unit ID

// Polling Defaults (seconds)
export const DEFAULT_SCAN_INTERVAL = 30;       // Full catalog read cadence
export const DEFAULT_TIMEOUT = 5;              // Per-request response bound
export const DEFAULT_FAILURE_THRESHOLD = 3;    // Failed cycles before persistent failure
export const MAX_TIMER_MS = 0x7FFFFFFF;        // Largest delay setTimeout/setInterval honour

// Register Sizes (16-bit words)
export const REG_SIZE_16 = 1;
export const REG_SIZE_32 = 2;

// Protocol Limits
export const MAX_READ_WORDS = 125;             // FC3 maximum quantity per request
export const MAX_ADDRESS = 0xFFFF;

// Integer Bounds
export const INT16_MIN = -0x8000;
export const INT16_MAX = 0x7FFF;
export const UINT16_MAX = 0xFFFF;
export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7FFFFFFF;
export const UINT32_MAX = 0xFFFFFFFF;
export const FLOAT32_MAX = 3.4028234663852886e38;

// Modbus Exception Codes
export const MODBUS_EXCEPTION_NAMES: Record<number, string> = {
    1: 'IllegalFunction',
    2: 'IllegalDataAddress',
    3: 'IllegalDataValue',
    4: 'ServerDeviceFailure',
    5: 'Acknowledge',
    6: 'ServerDeviceBusy',
    8: 'MemoryParityError',
    10: 'GatewayPathUnavailable',
    11: 'GatewayTargetDeviceFailedToRespond',
};

// Exception codes worth one more try on the same socket
export const RETRYABLE_EXCEPTIONS: readonly number[] = [
    6,  // ServerDeviceBusy
];

// Socket errors that mean the link is gone
export const FATAL_SOCKET_ERRORS = [
    'ECONNRESET',
    'ECONNREFUSED',
    'EPIPE',
    'EHOSTUNREACH',
    'ENETUNREACH',
    'ENOTFOUND',
    'Port Not Open',
];

// Node-RED
export const ADMIN_ROOT = '/heliotherm';
