import { compileJotSchema, jot } from '../jot.js';
import { ABUNDANCE_LABELS } from '../types/index.js';

export const abundanceNode = jot.object({
  surge_level: jot.enum(ABUNDANCE_LABELS, {
    description: 'Abundance level reported by the comment. Use "unknown" when it reports no catch at all.',
  }),
  reason: jot.string({ description: 'One short sentence naming the cue that decided the level.', minLength: 1 }),
});

export const abundanceFormat = compileJotSchema('firefly_squid_abundance', abundanceNode);
