/**
 * Manifest schemas: Docker image manifest v2 schema 2, Docker manifest list,
 * OCI image manifest and OCI image index.
 */

import { z } from 'zod';
import { isValidDigest } from '../services/digest';

export const MediaTypes = {
  DOCKER_MANIFEST: 'application/vnd.docker.distribution.manifest.v2+json',
  DOCKER_MANIFEST_LIST: 'application/vnd.docker.distribution.manifest.list.v2+json',
  OCI_MANIFEST: 'application/vnd.oci.image.manifest.v1+json',
  OCI_INDEX: 'application/vnd.oci.image.index.v1+json',
} as const;

export type ManifestMediaType = (typeof MediaTypes)[keyof typeof MediaTypes];

export const IMAGE_MANIFEST_TYPES: readonly string[] = [MediaTypes.DOCKER_MANIFEST, MediaTypes.OCI_MANIFEST];
export const INDEX_TYPES: readonly string[] = [MediaTypes.DOCKER_MANIFEST_LIST, MediaTypes.OCI_INDEX];

export function isManifestMediaType(value: string): value is ManifestMediaType {
  return IMAGE_MANIFEST_TYPES.includes(value) || INDEX_TYPES.includes(value);
}

export const descriptorSchema = z.object({
  mediaType: z.string().min(1),
  digest: z.string().refine(isValidDigest, { message: 'invalid digest' }),
  size: z.number().int().nonnegative(),
  urls: z.array(z.string()).optional(),
  annotations: z.record(z.string()).optional(),
  artifactType: z.string().optional(),
});

export const platformSchema = z.object({
  architecture: z.string(),
  os: z.string(),
  'os.version': z.string().optional(),
  'os.features': z.array(z.string()).optional(),
  variant: z.string().optional(),
  features: z.array(z.string()).optional(),
});

export const imageManifestSchema = z.object({
  schemaVersion: z.literal(2),
  mediaType: z.string().optional(),
  artifactType: z.string().optional(),
  config: descriptorSchema,
  layers: z.array(descriptorSchema),
  subject: descriptorSchema.optional(),
  annotations: z.record(z.string()).optional(),
});

export const imageIndexSchema = z.object({
  schemaVersion: z.literal(2),
  mediaType: z.string().optional(),
  artifactType: z.string().optional(),
  manifests: z.array(descriptorSchema.extend({ platform: platformSchema.optional() })),
  subject: descriptorSchema.optional(),
  annotations: z.record(z.string()).optional(),
});

export type Descriptor = z.infer<typeof descriptorSchema>;
export type ImageManifest = z.infer<typeof imageManifestSchema>;
export type ImageIndex = z.infer<typeof imageIndexSchema>;

export type ParsedManifest =
  | { kind: 'image'; mediaType: ManifestMediaType; manifest: ImageManifest }
  | { kind: 'index'; mediaType: ManifestMediaType; manifest: ImageIndex };
