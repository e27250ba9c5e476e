import { SensorFault } from "./errors.js";
import type { SensorDriver } from "./drivers.js";
import type { SimulatedStep } from "./schema.js";
import { roundTo, seededRandom } from "./util.js";

export type SimulatedOptions = {
  script?: SimulatedStep[];
  mean: number;
  jitter: number;
  seed: number;
};

/**
 * Hardware-free driver. With a script it plays the steps in order and starts
 * over; otherwise it draws gaussian noise around `mean` from a seeded PRNG.
 */
export class SimulatedDriver implements SensorDriver {
  readonly kind = "simulated";
  private step = 0;
  private random: () => number;

  constructor(private options: SimulatedOptions) {
    this.random = seededRandom(options.seed);
  }

  async read(signal: AbortSignal): Promise<number> {
    const script = this.options.script;
    if (!script || script.length === 0) {
      return roundTo(this.gaussian(this.options.mean, this.options.jitter), 3);
    }
    const next = script[this.step % script.length];
    this.step += 1;
    if (next === "error") throw new SensorFault("bus", "simulated sensor failure");
    if (next === "timeout") return hang(signal);
    return next;
  }

  private gaussian(mean: number, sigma: number): number {
    const u = 1 - this.random();
    const v = this.random();
    return mean + sigma * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
  }
}

function hang(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    const fail = () => reject(new SensorFault("timeout", "simulated sensor never answered"));
    if (signal.aborted) fail();
    else signal.addEventListener("abort", fail, { once: true });
  });
}
