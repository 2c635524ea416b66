/**
 * listener-mirror.ts — UI-side view of the listener, rebuilt from messages.
 *
 * The render loop never reads listener fields; it applies every drained
 * message here and asks the mirror instead.
 */

import type { ListenerMessage, ListenerStage } from "./voice-types.ts";

export class ListenerMirror {
  stage: ListenerStage = "STARTING";
  calibrated = false;
  alive = true;
  fatal: string | null = null;
  lastStatus = "";

  apply(msg: ListenerMessage) {
    if (msg.stage) {
      this.stage = msg.stage;
      if (msg.stage === "LISTENING") this.calibrated = true;
      if (msg.stage === "CALIBRATING" || msg.stage === "RECALIBRATING") this.calibrated = false;
      if (msg.stage === "STOPPED") this.alive = false;
    }
    if (msg.kind === "STATUS") this.lastStatus = msg.text;
    if (msg.kind === "FATAL_ERROR") {
      this.fatal = msg.text;
      this.alive = false;
    }
  }

  /** True while a captured phrase is being transcribed. */
  isSpeaking(): boolean {
    return this.stage === "RECOGNIZING";
  }
}
