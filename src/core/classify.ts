import type { DeclaredLanguage, TextKind } from "./types.js";

const XML_EXTENSIONS = new Set([
  ".xml",
  ".xsd",
  ".xsl",
  ".xslt",
  ".svg",
  ".plist",
  ".xhtml",
  ".rss",
  ".atom",
  ".wsdl",
  ".csproj",
  ".props",
  ".targets",
  ".config",
]);

const JSON_EXTENSIONS = new Set([".json", ".jsonc", ".geojson", ".webmanifest", ".sublime-settings"]);

export const classify = (sample: string, declaredLanguage: DeclaredLanguage): TextKind => {
  if (declaredLanguage === "xml" || declaredLanguage === "json") {
    return declaredLanguage;
  }
  const first = sample.trim().charAt(0);
  if (first === "<") {
    return "xml";
  }
  if (first === "{" || first === "[") {
    return "json";
  }
  return "unsupported";
};

export const languageFromPath = (filePath: string): DeclaredLanguage => {
  const base = filePath.split(/[\\/]/).pop() ?? "";
  const dot = base.lastIndexOf(".");
  if (dot <= 0) {
    return "plain";
  }
  const extension = base.slice(dot).toLowerCase();
  if (XML_EXTENSIONS.has(extension)) {
    return "xml";
  }
  if (JSON_EXTENSIONS.has(extension)) {
    return "json";
  }
  return "plain";
};

export const isDeclaredLanguage = (value: string): value is DeclaredLanguage =>
  value === "xml" || value === "json" || value === "plain";
