import { z } from 'zod';

const oclcNumber = z.union([z.string(), z.number()]).transform((value) => String(value));

/** `GET /bib/checkcontrolnumbers` */
export const CheckControlNumbersResponseSchema = z.object({
    entry: z.array(
        z.object({
            requestedOclcNumber: oclcNumber,
            currentOclcNumber: oclcNumber.optional(),
            found: z.boolean(),
            merged: z.boolean().optional()
        }).passthrough()
    )
}).passthrough();

/** `POST` / `DELETE /ih/datalist` */
export const HoldingsResponseSchema = z.object({
    entry: z.array(
        z.object({
            requestedOclcNumber: oclcNumber,
            currentOclcNumber: oclcNumber.optional(),
            httpStatusCode: z.string(),
            errorDetail: z.string().nullish().transform((value) => value ?? '')
        }).passthrough()
    )
}).passthrough();

/** `GET /brief-bibs` */
export const BriefBibsResponseSchema = z.object({
    numberOfRecords: z.number().int().nonnegative(),
    briefRecords: z.array(z.object({ oclcNumber }).passthrough()).optional()
}).passthrough();

export type CheckControlNumbersResponse = z.infer<typeof CheckControlNumbersResponseSchema>;
export type HoldingsResponse = z.infer<typeof HoldingsResponseSchema>;
export type BriefBibsResponse = z.infer<typeof BriefBibsResponseSchema>;
