// Sanitize a title for use in a filename
export function slugify(title: string, maxLength = 50): string {
  const slug = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .substring(0, maxLength)
    .replace(/_+$/, "");

  return slug;
}

export function safeRunName(name: string): string {
  return name.replace(/[^\w\-.]/g, "_") || "run";
}
