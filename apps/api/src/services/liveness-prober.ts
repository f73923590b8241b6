import dgram from "node:dgram";
import net from "node:net";
import type { FastifyBaseLogger } from "fastify";
import { errorMessage } from "../domain/errors.js";
import type { ProbeOutcome, ProbeResult, ProbeTarget } from "../domain/types.js";
import { buildInfoRequest, parseInfoReply, perspectiveFromKeywords } from "../lib/a2s.js";
import { mapInCompletionOrder } from "../lib/task-pool.js";

export type ProbeFn = (target: ProbeTarget, timeoutMs: number) => Promise<ProbeOutcome>;

export type ProbeAllOptions = {
  timeoutMs: number;
  concurrency: number;
};

export interface ProbeRunner {
  probeAll(targets: ProbeTarget[], options: ProbeAllOptions): AsyncIterable<ProbeResult>;
  /** Resolves once every probe started so far has settled, including those of abandoned iterations. */
  idle(): Promise<void>;
}

/**
 * One A2S_INFO exchange with `host:port`. A challenge reply is answered once within the same
 * timeout budget; the reported latency is the round trip that produced the info reply.
 * Never rejects; any failure resolves as `unreachable`.
 */
export function queryServerInfo(host: string, port: number, timeoutMs: number): Promise<ProbeOutcome> {
  return new Promise((resolve) => {
    const socket = dgram.createSocket(net.isIPv6(host) ? "udp6" : "udp4");
    let settled = false;
    let closed = false;
    let challenged = false;
    let sentAt = 0;

    const finish = (outcome: ProbeOutcome) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      if (!closed) {
        socket.close();
      }
      resolve(outcome);
    };

    const send = (packet: Buffer) => {
      sentAt = performance.now();
      socket.send(packet, port, host, (error) => {
        if (error) {
          finish({ kind: "unreachable", reason: error.message });
        }
      });
    };

    const timer = setTimeout(() => {
      finish({ kind: "unreachable", reason: "timeout" });
    }, timeoutMs);

    socket.on("close", () => {
      closed = true;
    });

    socket.on("error", (error) => {
      finish({ kind: "unreachable", reason: error.message });
    });

    socket.on("message", (message) => {
      const reply = parseInfoReply(message);
      if (reply.type === "challenge" && !challenged) {
        challenged = true;
        send(buildInfoRequest(reply.challenge));
        return;
      }

      if (reply.type === "info") {
        finish({
          kind: "reachable",
          pingMs: Math.max(0, Math.round(performance.now() - sentAt)),
          playerCount: reply.info.players,
          maxPlayers: Math.max(reply.info.maxPlayers, reply.info.players),
          map: reply.info.map,
          perspective: perspectiveFromKeywords(reply.info.keywords)
        });
        return;
      }

      finish({ kind: "unreachable", reason: reply.type === "invalid" ? reply.reason : "repeated challenge" });
    });

    send(buildInfoRequest());
  });
}

const udpProbe: ProbeFn = (target, timeoutMs) => queryServerInfo(target.host, target.queryPort, timeoutMs);

export class LivenessProber implements ProbeRunner {
  private readonly probe: ProbeFn;
  private readonly now: () => number;
  private readonly logger: FastifyBaseLogger | null;
  private readonly inFlight = new Set<Promise<ProbeResult>>();

  constructor(options: { probe?: ProbeFn; now?: () => number; logger?: FastifyBaseLogger } = {}) {
    this.probe = options.probe ?? udpProbe;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? null;
  }

  /** Lazy and single-use: results arrive in completion order; iterate again by calling again. */
  probeAll(targets: ProbeTarget[], options: ProbeAllOptions): AsyncGenerator<ProbeResult, void, undefined> {
    return mapInCompletionOrder(targets, options.concurrency, (target) => {
      const pending = this.probeOne(target, options.timeoutMs);
      this.inFlight.add(pending);
      void pending.finally(() => {
        this.inFlight.delete(pending);
      });
      return pending;
    });
  }

  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private async probeOne(target: ProbeTarget, timeoutMs: number): Promise<ProbeResult> {
    let outcome: ProbeOutcome;
    try {
      outcome = await this.probe(target, timeoutMs);
    } catch (error) {
      outcome = { kind: "unreachable", reason: errorMessage(error) };
    }

    this.logger?.debug({ address: target.address, outcome: outcome.kind }, "probe settled");
    return { target, outcome, observedAt: this.now() };
  }
}
