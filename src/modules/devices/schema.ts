import { z } from 'zod'

export const DeviceSummarySchema = z.object({
  index: z.number().int(),
  name: z.string(),
  category: z.number().int(),
  categoryName: z.string(),
})

export const DeviceListResponseSchema = z.object({
  devices: z.array(DeviceSummarySchema),
  count: z.number().int(),
})

export const CategorySchema = z.object({
  code: z.number().int(),
  name: z.string(),
  kind: z.enum(['actuator', 'sensor']),
})

export const CategoryListResponseSchema = z.object({
  categories: z.array(CategorySchema),
})

export type DeviceSummary = z.infer<typeof DeviceSummarySchema>
export type DeviceListResponse = z.infer<typeof DeviceListResponseSchema>
export type CategoryListResponse = z.infer<typeof CategoryListResponseSchema>
