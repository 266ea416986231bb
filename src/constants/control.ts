export const DEFAULT_SERIAL_PORT = 'COM3';
export const DEFAULT_BAUD_RATE = 115_200;

// Arduino-style boards reset when the port opens; anything sent before this is lost.
export const DEVICE_RESET_SETTLE_MS = 2_000;

export const LINE_READ_TIMEOUT_MS = 200;
export const COMMAND_ACK_TIMEOUT_MS = 20_000;
export const MOVE_ACK_TIMEOUT_MS = 5_000;
export const SAMPLE_TIMEOUT_MS = 2_000;

export const ACK_MARKER = 'OK';
export const ADC_VALUE_PATTERN = /ADC:\s*([-+]?\d+)/;

export const LINE_TERMINATOR = '\n';

export const ADC_ON_COMMAND = 'adc on';
export const ADC_OFF_COMMAND = 'adc off';
export const ADC_READ_COMMAND = 'adc read';

export const MOCK_PORT_PREFIX = 'mock://';
