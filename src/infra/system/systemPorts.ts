import type { ClockPort } from "../../core/ports/outboundPorts";

/**
 * Wall-clock boundary; services take a `ClockPort` so watermarks stay deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}
