import type { ClockPort } from "../../core/ports/outboundPorts";

/**
 * Wall-clock boundary. Tests substitute a fixed clock to drive cache expiry.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}
