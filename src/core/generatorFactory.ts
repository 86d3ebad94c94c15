import { BidGenerator, BidGeneratorType } from '../models/types';
import { RandomGenerator } from './generators/randomGenerator';
import { EvenGenerator } from './generators/evenGenerator';

/**
 * Factory for bid generator instances.
 *
 * To register a new generator:
 * 1. Implement BidGenerator interface
 * 2. Add entry in the generatorMap below
 * 3. Add type to BidGeneratorType union in types.ts
 */
const generatorMap: Record<BidGeneratorType, () => BidGenerator> = {
  random: () => new RandomGenerator(),
  even: () => new EvenGenerator(),
};

/**
 * Get a bid generator by type.
 */
export function getGenerator(type: BidGeneratorType): BidGenerator {
  const factory: (() => BidGenerator) | undefined = generatorMap[type];
  if (!factory) {
    throw new Error(`Unknown bid generator: ${type}`);
  }
  return factory();
}

/** Narrow free-form text (e.g. a CLI flag) to a generator type. */
export function isGeneratorType(value: string): value is BidGeneratorType {
  return Object.prototype.hasOwnProperty.call(generatorMap, value);
}

/**
 * List all registered generator types.
 */
export function listGenerators(): BidGeneratorType[] {
  return Object.keys(generatorMap).filter(isGeneratorType);
}
