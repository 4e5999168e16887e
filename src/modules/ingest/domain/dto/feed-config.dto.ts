import { z } from 'zod';

export const schemaFeedConfig = z.object({
  name: z.string().min(1),
  url: z.url(),
});

export const schemaFeedList = z.array(schemaFeedConfig);
