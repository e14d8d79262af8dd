import { v4 as uuidv4 } from "uuid";

/**
 * URL slug from free text: lowercase ASCII letters, digits and single dashes.
 * Text with no ASCII letters or digits gets a random slug.
 */
export function slugify(text: string): string {
  const slug = text
    .normalize("NFKD")
    .replace(/[̀-ͯ]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug.length > 0 ? slug : `item-${uuidv4().slice(0, 8)}`;
}
