import { z } from 'zod';

const linkSchema = z.string()
    .trim()
    .min(1, 'Link is required')
    .url('Link must be an absolute URL');

const destinationShape = {
    destinationAddress: z.string()
        .trim()
        .min(1, 'Destination address is required'),
    destinationZip: z.string()
        .trim()
        .min(1, 'Destination ZIP code is required')
        .max(20, 'ZIP code seems too long'),
};

// Unknown methods are not rejected here; the assembler falls back to the default carrier.
const shippingMethodSchema = z.string().trim().min(1).optional();

const positiveOverride = (label: string) => z.number()
    .positive(`${label} override must be positive`)
    .optional();

export const overridesSchema = z.object({
    weight: z.number()
        .positive('Weight override must be positive')
        .max(50, 'Weight override cannot exceed 50 kg')
        .optional(),
    length: positiveOverride('Length'),
    width: positiveOverride('Width'),
    height: positiveOverride('Height'),
    price: positiveOverride('Price'),
});

export const landedCostRequestSchema = z.object({
    link: linkSchema,
    shippingMethod: shippingMethodSchema,
    ...destinationShape,
    overrides: overridesSchema.optional(),
    saveToHistory: z.boolean().optional(),
});

export const batchRequestSchema = z.object({
    links: z.array(z.string())
        .transform((links) => links.map(l => l.trim()).filter(l => l.length > 0))
        .pipe(z.array(linkSchema)
            .min(1, 'At least one link is required')
            .max(50, 'Maximum 50 links per batch')),
    shippingMethod: shippingMethodSchema,
    ...destinationShape,
    consolidated: z.boolean().optional(),
    saveToHistory: z.boolean().optional(),
});

export const savedAddressSchema = z.object({
    address: z.string().trim().min(1, 'Address is required'),
    zipCode: z.string().trim().min(1, 'ZIP code is required').max(20, 'ZIP code seems too long'),
    name: z.string().trim().optional(),
});

export type ValidatedLandedCostRequest = z.infer<typeof landedCostRequestSchema>;
export type ValidatedBatchRequest = z.infer<typeof batchRequestSchema>;
export type ValidatedSavedAddress = z.infer<typeof savedAddressSchema>;

export function validateLandedCostRequest(input: unknown): ValidatedLandedCostRequest {
    return landedCostRequestSchema.parse(input);
}
export function validateBatchRequest(input: unknown): ValidatedBatchRequest {
    return batchRequestSchema.parse(input);
}
export function validateSavedAddress(input: unknown): ValidatedSavedAddress {
    return savedAddressSchema.parse(input);
}
