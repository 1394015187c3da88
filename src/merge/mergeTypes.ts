import { z } from 'zod';

// Absent strings read as empty; absent lists as empty lists.
const text = z.string().default('');

export const ContactSchema = z.object({
    name: text,
    email: text,
});

export const AppLicenseSchema = z.object({
    id: text,
    expression: text,
});

export const AppChecksumSchema = z.object({
    algorithm: text,
    value: text,
});

/** Metadata of the product the merged document describes; becomes the root package. */
export const AppMetadataSchema = z.object({
    name: text,
    version: text,
    description: text,
    supplier: ContactSchema.default({}),
    authors: z.array(ContactSchema).default([]),
    license: AppLicenseSchema.default({}),
    checksums: z.array(AppChecksumSchema).default([]),
    copyright: text,
    primaryPurpose: text,
    purl: text,
    cpe: text,
});

/**
 * Layout of the merge configuration file:
 * ```json
 * {
 *   "app": { "name": "...", "version": "...", "supplier": { "name": "...", "email": "..." }, ... },
 *   "output": { "file": "merged.spdx.json" },
 *   "merge": { "flat": false }
 * }
 * ```
 */
export const MergeConfigFileSchema = z.object({
    app: AppMetadataSchema.default({}),
    output: z.object({ file: text }).default({}),
    merge: z.object({ flat: z.boolean().default(false) }).default({}),
});

export type Contact = z.infer<typeof ContactSchema>;
export type AppLicense = z.infer<typeof AppLicenseSchema>;
export type AppChecksum = z.infer<typeof AppChecksumSchema>;
export type AppMetadata = z.infer<typeof AppMetadataSchema>;
export type MergeConfigFile = z.infer<typeof MergeConfigFileSchema>;

export type MergeMode = 'hierarchical' | 'flat';

export interface MergeSettings {
    app: AppMetadata;
    inputFiles: string[];
    /** Absent means standard output. */
    outputFile?: string;
    mode: MergeMode;
}

export function emptyAppMetadata(): AppMetadata {
    return AppMetadataSchema.parse({});
}
