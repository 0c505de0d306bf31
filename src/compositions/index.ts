import { Composition } from '../types.js';
import { gen3Bringup } from './gen3-bringup.js';

export { gen3Bringup } from './gen3-bringup.js';

export const builtinCompositions: ReadonlyMap<string, Composition> = new Map([
  [gen3Bringup.name, gen3Bringup],
]);

export const DEFAULT_COMPOSITION = gen3Bringup.name;
