import { z } from 'zod';

/**
 * Steam persona state. Anything that does not coerce to an integer counts as Offline (0).
 */
export const personaStateSchema = z.coerce.number().int().catch(0);
