import { MessageChannel, Worker, type MessagePort } from "node:worker_threads";
import { createLogger } from "../logger";
import { DOORBELL_SEQ } from "../transport/worker";

const logger = createLogger("notifier");

// Runs on its own thread. Blocks on the doorbell (or spins when polling), polls
// the control port for "shutdown" and reports every doorbell change as a tick.
const NOTIFIER_SOURCE = `
const { parentPort, workerData, receiveMessageOnPort } = require("node:worker_threads");
const doorbell = new Int32Array(workerData.doorbell);
const control = workerData.control;
const slot = workerData.slot;
let seen = workerData.seen;
for (;;) {
  if (!workerData.polling) Atomics.wait(doorbell, slot, seen, workerData.periodMs);
  const message = receiveMessageOnPort(control);
  if (message && message.message === "shutdown") break;
  const current = Atomics.load(doorbell, slot);
  if (current !== seen) {
    seen = current;
    parentPort.postMessage("tick");
  }
}
control.close();
`;

export interface NotifierOptions {
  doorbell: Int32Array;
  /** Bound on each blocking wait, so shutdown is noticed even when idle. */
  periodMs: number;
  /** Spin instead of blocking. */
  polling: boolean;
  onTick: () => void;
}

/** Background thread that turns doorbell changes into messages. */
export class CompletionNotifier {
  private readonly thread: Worker;
  private readonly control: MessagePort;
  private readonly exited: Promise<void>;
  private hasExited = false;
  private stopping = false;

  constructor(private readonly options: NotifierOptions) {
    if (!(options.doorbell.buffer instanceof SharedArrayBuffer)) {
      throw new TypeError("notifier doorbell must live in a SharedArrayBuffer");
    }
    // Baseline taken here, not on the thread: rings between now and thread
    // start-up must still produce a tick.
    const seen = Atomics.load(options.doorbell, DOORBELL_SEQ);
    const { port1, port2 } = new MessageChannel();
    this.control = port1;
    this.thread = new Worker(NOTIFIER_SOURCE, {
      eval: true,
      workerData: {
        doorbell: options.doorbell.buffer,
        control: port2,
        slot: DOORBELL_SEQ,
        seen,
        periodMs: options.periodMs,
        polling: options.polling,
      },
      transferList: [port2],
    });
    this.exited = new Promise(resolve => {
      this.thread.once("exit", code => {
        this.hasExited = true;
        if (code !== 0 && !this.stopping) {
          logger.error(`notifier thread exited with code ${code}`);
        }
        resolve();
      });
    });
    this.thread.on("message", message => {
      if (message === "tick") options.onTick();
    });
    this.thread.on("error", err => logger.error("notifier thread failed", err));
  }

  get running(): boolean {
    return !this.hasExited;
  }

  async stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = true;
      if (!this.hasExited) {
        this.control.postMessage("shutdown");
        // Bump the counter too: a notify alone is lost if the thread is between
        // its control check and its next wait.
        Atomics.add(this.options.doorbell, DOORBELL_SEQ, 1);
        Atomics.notify(this.options.doorbell, DOORBELL_SEQ);
      }
    }
    await this.exited;
    this.control.close();
  }
}
