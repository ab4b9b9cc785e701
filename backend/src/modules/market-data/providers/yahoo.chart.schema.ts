import { z } from 'zod';

const nullableNumbers = z.array(z.number().nullable());

export const YahooChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z
            .object({
              symbol: z.string().optional(),
              currency: z.string().nullable().optional(),
              gmtoffset: z.number().optional(),
            })
            .passthrough(),
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z
              .array(
                z.object({
                  open: nullableNumbers.optional(),
                  high: nullableNumbers.optional(),
                  low: nullableNumbers.optional(),
                  close: nullableNumbers.optional(),
                  volume: nullableNumbers.optional(),
                }),
              )
              .default([]),
            adjclose: z.array(z.object({ adjclose: nullableNumbers.optional() })).optional(),
          }),
        }),
      )
      .nullable(),
    error: z
      .object({
        code: z.string(),
        description: z.string().nullable().optional(),
      })
      .nullable()
      .optional(),
  }),
});

export type YahooChartResponse = z.infer<typeof YahooChartResponseSchema>;

export const YahooSearchResponseSchema = z.object({
  news: z
    .array(
      z
        .object({
          title: z.string(),
          link: z.string(),
          publisher: z.string().default(''),
          providerPublishTime: z.number().optional(),
        })
        .passthrough(),
    )
    .default([]),
});

export type YahooSearchResponse = z.infer<typeof YahooSearchResponseSchema>;
