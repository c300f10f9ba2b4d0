import type { Enricher, EnrichmentContext } from './core.ts';

export function pipeline<A, B>(s1: Enricher<A, B>): Enricher<A, B>;
export function pipeline<A, B, C>(s1: Enricher<A, B>, s2: Enricher<B, C>): Enricher<A, C>;
export function pipeline<A, B, C, D>(
  s1: Enricher<A, B>,
  s2: Enricher<B, C>,
  s3: Enricher<C, D>,
): Enricher<A, D>;
export function pipeline<A, B, C, D, E>(
  s1: Enricher<A, B>,
  s2: Enricher<B, C>,
  s3: Enricher<C, D>,
  s4: Enricher<D, E>,
): Enricher<A, E>;

// each step's output feeds the next step's input; the overloads carry the types
export function pipeline(...steps: Array<Enricher<any, any>>): Enricher<any, any> {
  return (item: unknown, ctx: EnrichmentContext) => {
    let cur = item;
    for (const step of steps) {
      cur = step(cur, ctx);
    }
    return cur;
  };
}
