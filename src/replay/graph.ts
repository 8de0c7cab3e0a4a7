import _ from 'lodash';
import { LengthMismatchError } from './errors';

export type GraphPoint = [time: number, value: number];

/** A time/value series from the score screen, e.g. army value over time. */
export class Graph {
  readonly times: number[];
  readonly values: number[];

  constructor(times: number[], values: number[]) {
    if (times.length !== values.length) {
      throw new LengthMismatchError(times.length, values.length);
    }
    this.times = [...times];
    this.values = [...values];
  }

  static fromPoints(points: Iterable<GraphPoint>): Graph {
    const [times = [], values = []] = _.unzip(Array.from(points));
    return new Graph(times, values);
  }

  get length(): number {
    return Math.min(this.times.length, this.values.length);
  }

  /** Restartable view of the series as (time, value) pairs. */
  asPoints(): Iterable<GraphPoint> {
    const { times, values } = this;
    return {
      *[Symbol.iterator](): Generator<GraphPoint> {
        const size = Math.min(times.length, values.length);
        for (let i = 0; i < size; i += 1) {
          yield [times[i], values[i]];
        }
      },
    };
  }

  toString(): string {
    return `Graph with ${this.times.length} values`;
  }
}
