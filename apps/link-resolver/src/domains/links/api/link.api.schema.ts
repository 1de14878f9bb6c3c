import { z } from "zod/mini"

export const linkQuerySchema = z.object({
  id: z.string({ error: "Query parameter id is required" }),
})

export type LinkQuery = z.infer<typeof linkQuerySchema>
