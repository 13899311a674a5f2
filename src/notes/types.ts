export interface NoteFrontmatter {
  /** Weather line appended to the body; its presence means weather was already added. */
  weather?: string;
  [key: string]: unknown;
}

export interface Note {
  filePath: string;
  frontmatter: NoteFrontmatter;
  content: string; // Body without frontmatter
  rawContent: string; // Full file content including frontmatter
}
