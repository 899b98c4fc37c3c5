/**
 * Monitor Schemas
 *
 * zod schemas for stored job records and crawler feed documents.
 */

import { z } from 'zod'

const optionalText = z.string().optional()

const postingFields = {
  externalId: z.string().min(1),
  title: z.string(),
  company: z.string(),
  description: optionalText,
  salary: optionalText,
  city: optionalText,
  district: optionalText,
  companySize: optionalText,
  industry: optionalText,
  experience: optionalText,
  education: optionalText,
  skillTags: z.array(z.string()).optional(),
  url: optionalText
}

export const JobRecordSchema = z.object({
  ...postingFields,
  publishedAt: z.number().optional(),
  firstSeenAt: z.number(),
  lastUpdatedAt: z.number(),
  status: z.enum(['active', 'closed', 'expired'])
})

/** Epoch ms, or an ISO-8601 string */
const Timestamp = z.union([
  z.number(),
  z
    .string()
    .transform((value, ctx) => {
      const ms = Date.parse(value)
      if (Number.isNaN(ms)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` })
        return z.NEVER
      }
      return ms
    })
])

export const FeedPostingSchema = z.object({
  ...postingFields,
  publishedAt: Timestamp.optional()
})

/** A bare array of postings, or `{ "jobs": [...] }` */
export const FeedSchema = z.union([
  z.array(FeedPostingSchema),
  z.object({ jobs: z.array(FeedPostingSchema) }).transform((feed) => feed.jobs)
])
