import { LOG_MESSAGE_DEVICE } from "@vrlog/osc-recorder-contracts";
import { emptyRow } from "./schema.js";
import type { SessionClock } from "./session-clock.js";
import type { LogMessageEvent, UnifiedRow } from "./types.js";

export function buildMessageRow(
  event: LogMessageEvent,
  clock: SessionClock,
  device: string = LOG_MESSAGE_DEVICE,
): UnifiedRow {
  const row = emptyRow(device, event.text);
  return { ...row, ...clock.syncLocal(event.timeLocal) };
}
