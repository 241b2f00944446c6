/**
 * Public test utilities, exported from the `"consolelink/testing"` entry point.
 * Consumers can drive a ConsoleClient end to end without a console or network.
 */
export {
  createFakeCryptoContext,
  FakeCryptoContext,
  FakeDeviceLocator,
  TEST_CERTIFICATE,
} from "./testing/fakes.js";
export { MemoryTransport } from "./testing/memory-transport.js";
export type { ChannelOpenOutcome, SimulatedConsoleOptions } from "./testing/simulated-console.js";
export { SimulatedConsole } from "./testing/simulated-console.js";
