/**
 * Zod schemas for the Graph payloads this client reads.
 *
 * Responses are parsed here, once, at the HTTP boundary. A listing without
 * "value" parses as an empty listing; anything else that does not fit
 * raises MalformedResponseError.
 */
import { z } from "zod";
import { MalformedResponseError } from "./errors";

const marker = z.record(z.unknown());

export const driveItemSchema = z.object({
  id: z.string(),
  name: z.string(),
  webUrl: z.string().optional(),
  size: z.number().optional(),
  folder: marker.optional(),
  file: marker.optional(),
  parentReference: z
    .object({ path: z.string().optional() })
    .passthrough()
    .optional(),
});

export type GraphDriveItem = z.infer<typeof driveItemSchema>;

export const siteSchema = z.object({
  id: z.string(),
  name: z.string().default(""),
  displayName: z.string().optional(),
  webUrl: z.string().default(""),
  description: z.string().optional(),
});

export const driveSchema = z.object({
  id: z.string(),
  name: z.string(),
  driveType: z.string().optional(),
  webUrl: z.string().optional(),
});

/** Any response of which only the id is read (site lookups, 201 Created) */
export const resourceIdSchema = z.object({ id: z.string() });

export const graphErrorSchema = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string().optional(),
  }),
});

export function listingOf<T extends z.ZodTypeAny>(item: T) {
  return z.object({ value: z.array(item).default([]) });
}

export const driveItemListingSchema = listingOf(driveItemSchema);
export const siteListingSchema = listingOf(siteSchema);
export const driveListingSchema = listingOf(driveSchema);

export function parseGraph<T extends z.ZodTypeAny>(
  schema: T,
  body: unknown,
  url: string
): z.infer<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new MalformedResponseError(
      url,
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
      )
    );
  }
  return result.data;
}

export function isFolder(item: GraphDriveItem): boolean {
  return item.folder !== undefined;
}

export function isFile(item: GraphDriveItem): boolean {
  return item.file !== undefined;
}
