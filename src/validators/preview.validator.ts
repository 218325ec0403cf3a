import { z } from 'zod';
import { PRINT_MODES } from '../models/print-job.model';

export const previewQuerySchema = z.object({
  mode: z.enum(PRINT_MODES).optional(),
  page: z.coerce.number().int('page must be an integer').min(1, 'page must be >= 1').default(1),
  w: z.coerce
    .number()
    .int('width must be an integer')
    .min(64, 'width must be between 64 and 2000')
    .max(2000, 'width must be between 64 and 2000')
    .default(720),
});

export type PreviewQuery = z.infer<typeof previewQuerySchema>;
