/**
 * Line-preserving INI document.
 *
 * Parsing follows the usual INI conventions: "[section]" headers, "key = value"
 * or "key: value", ";" and "#" comment lines, option names matched without
 * regard to case. Values are not stripped of inline comments. Writes touch
 * only the line that holds the setting, so comments and layout survive.
 *
 * Encodings: UTF-16LE BOM, UTF-8 BOM, otherwise UTF-8; saved back unchanged.
 */

export type IniEncoding = "utf-8" | "utf-8-bom" | "utf-16le";

interface IniEntry {
  line: number;
  /** Everything up to and including the delimiter and the space after it */
  prefix: string;
  value: string;
}

const GLOBAL = "";
const SECTION = /^\s*\[([^\]]+)\]\s*$/;

export function decodeConfig(buffer: Buffer): { text: string; encoding: IniEncoding } {
  if (buffer.length >= 2 && buffer[0] === 0xff && buffer[1] === 0xfe) {
    return { text: buffer.subarray(2).toString("utf16le"), encoding: "utf-16le" };
  }
  if (buffer.length >= 3 && buffer[0] === 0xef && buffer[1] === 0xbb && buffer[2] === 0xbf) {
    return { text: buffer.subarray(3).toString("utf-8"), encoding: "utf-8-bom" };
  }
  return { text: buffer.toString("utf-8"), encoding: "utf-8" };
}

export function encodeConfig(text: string, encoding: IniEncoding): Buffer {
  if (encoding === "utf-16le") return Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from(text, "utf16le")]);
  if (encoding === "utf-8-bom") return Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from(text, "utf-8")]);
  return Buffer.from(text, "utf-8");
}

export class IniFile {
  private readonly lines: string[];
  private readonly eol: string;
  /** section → lowercased option → entry */
  private readonly index = new Map<string, Map<string, IniEntry>>();
  /** Last line index belonging to each section, for appends */
  private readonly sectionEnd = new Map<string, number>();

  constructor(text: string, readonly encoding: IniEncoding = "utf-8") {
    this.eol = text.includes("\r\n") ? "\r\n" : "\n";
    this.lines = text.split(/\r?\n/);
    this.reindex();
  }

  static fromBuffer(buffer: Buffer): IniFile {
    const { text, encoding } = decodeConfig(buffer);
    return new IniFile(text, encoding);
  }

  private reindex(): void {
    this.index.clear();
    this.sectionEnd.clear();
    let section = GLOBAL;
    this.index.set(GLOBAL, new Map());

    this.lines.forEach((line, i) => {
      const trimmed = line.trim();
      const header = SECTION.exec(line);
      if (header) {
        section = header[1].trim();
        if (!this.index.has(section)) this.index.set(section, new Map());
        this.sectionEnd.set(section, i);
        return;
      }
      if (!trimmed || trimmed.startsWith(";") || trimmed.startsWith("#")) return;

      const eq = line.indexOf("=");
      const colon = line.indexOf(":");
      const at = eq === -1 ? colon : colon === -1 ? eq : Math.min(eq, colon);
      if (at <= 0) return;
      const key = line.slice(0, at).trim();
      if (!key) return;

      const rest = line.slice(at + 1);
      const lead = rest.length - rest.trimStart().length;
      this.index.get(section)?.set(key.toLowerCase(), {
        line: i,
        prefix: line.slice(0, at + 1 + lead),
        value: rest.trim(),
      });
      this.sectionEnd.set(section, i);
    });
  }

  /** Named sections in file order (keys before the first header are not a section) */
  sections(): string[] {
    return [...this.index.keys()].filter(s => s !== GLOBAL);
  }

  has(section: string, key: string): boolean {
    return this.index.get(section)?.has(key.toLowerCase()) ?? false;
  }

  get(section: string, key: string): string | undefined {
    return this.index.get(section)?.get(key.toLowerCase())?.value;
  }

  /** Parsed content only, layout and comments ignored */
  entries(): Map<string, Map<string, string>> {
    const out = new Map<string, Map<string, string>>();
    for (const [section, entries] of this.index) {
      if (section === GLOBAL && !entries.size) continue;
      out.set(section, new Map([...entries].map(([key, entry]) => [key, entry.value])));
    }
    return out;
  }

  set(section: string, key: string, value: string): void {
    const entry = this.index.get(section)?.get(key.toLowerCase());
    if (entry) {
      this.lines[entry.line] = `${entry.prefix}${value}`;
    } else if (this.sectionEnd.has(section)) {
      const end = this.sectionEnd.get(section) ?? this.lines.length - 1;
      this.lines.splice(end + 1, 0, `${key} = ${value}`);
    } else {
      if (this.lines.length && this.lines[this.lines.length - 1] === "") this.lines.pop();
      this.lines.push(`[${section}]`, `${key} = ${value}`, "");
    }
    this.reindex();
  }

  toString(): string {
    return this.lines.join(this.eol);
  }

  toBuffer(): Buffer {
    return encodeConfig(this.toString(), this.encoding);
  }
}

export function sameIniContent(a: IniFile, b: IniFile): boolean {
  const left = a.entries();
  const right = b.entries();
  if (left.size !== right.size) return false;
  for (const [section, entries] of left) {
    const other = right.get(section);
    if (!other || other.size !== entries.size) return false;
    for (const [key, value] of entries) if (other.get(key) !== value) return false;
  }
  return true;
}
