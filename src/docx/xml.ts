/**
 * Minimal OOXML tree: parse a part into elements, edit, serialize back.
 *
 * Only the structure is modelled. Attribute text, comments, processing
 * instructions and character data are kept verbatim so untouched markup
 * round-trips byte for byte.
 */

export interface XmlElement {
  type: "element";
  name: string;
  /** Raw attribute text including leading whitespace, e.g. ` w:val="x"`. */
  attrs: string;
  children: XmlNode[];
  selfClosing: boolean;
}

/** Verbatim markup: character data (still escaped), comments, prolog. */
export interface XmlRaw {
  type: "raw";
  value: string;
}

export type XmlNode = XmlElement | XmlRaw;

const TOKEN_RE =
  /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>|<\?[\s\S]*?\?>|<!DOCTYPE[^>]*>|<\/([^\s>]+)\s*>|<([^\s/>!?]+)((?:[^>"']|"[^"]*"|'[^']*')*?)(\/?)>|[^<]+/g;

/**
 * Parse an XML string into a synthetic `#document` element whose children
 * are the top-level nodes (prolog + root element).
 */
export function parseXml(xml: string): XmlElement {
  const root = element("#document");
  const stack: XmlElement[] = [root];

  for (const m of xml.matchAll(TOKEN_RE)) {
    const top = stack[stack.length - 1];
    const [token, closeName, openName, attrs, slash] = m;

    if (closeName !== undefined) {
      if (stack.length === 1 || top.name !== closeName) {
        throw new Error(`Malformed XML: unexpected </${closeName}> inside <${top.name}>`);
      }
      stack.pop();
      continue;
    }

    if (openName !== undefined) {
      const el: XmlElement = {
        type: "element",
        name: openName,
        attrs: attrs ?? "",
        children: [],
        selfClosing: slash === "/",
      };
      top.children.push(el);
      if (!el.selfClosing) stack.push(el);
      continue;
    }

    top.children.push({ type: "raw", value: token });
  }

  if (stack.length !== 1) {
    throw new Error(`Malformed XML: <${stack[stack.length - 1].name}> is never closed`);
  }
  return root;
}

export function serializeXml(node: XmlNode): string {
  if (node.type === "raw") return node.value;
  const inner = node.children.map(serializeXml).join("");
  if (node.name === "#document") return inner;
  if (node.children.length === 0 && node.selfClosing) {
    return `<${node.name}${node.attrs}/>`;
  }
  return `<${node.name}${node.attrs}>${inner}</${node.name}>`;
}

// ── Construction ────────────────────────────────────────────────────

export function element(
  name: string,
  attributes: Record<string, string> = {},
  children: XmlNode[] = [],
): XmlElement {
  const attrs = Object.entries(attributes)
    .map(([k, v]) => ` ${k}="${escapeXml(v)}"`)
    .join("");
  return { type: "element", name, attrs, children, selfClosing: children.length === 0 };
}

/** Character data node; `value` is plain text and gets escaped. */
export function textNode(value: string): XmlRaw {
  return { type: "raw", value: escapeXml(value) };
}

export function cloneNode<T extends XmlNode>(node: T): T {
  return structuredClone(node);
}

// ── Navigation ──────────────────────────────────────────────────────

export function childElements(node: XmlElement, name?: string): XmlElement[] {
  const out: XmlElement[] = [];
  for (const child of node.children) {
    if (child.type === "element" && (name === undefined || child.name === name)) {
      out.push(child);
    }
  }
  return out;
}

export function firstChild(node: XmlElement, name: string): XmlElement | undefined {
  return childElements(node, name)[0];
}

/** Concatenated, decoded character data directly inside an element. */
export function innerText(node: XmlElement): string {
  return node.children
    .map((c) => (c.type === "raw" && !c.value.startsWith("<") ? decodeXml(c.value) : ""))
    .join("");
}

// ── Attributes ──────────────────────────────────────────────────────

export function getAttr(node: XmlElement, name: string): string | undefined {
  const re = new RegExp(`(?:^|\\s)${escapeRegExp(name)}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`);
  const m = re.exec(node.attrs);
  if (!m) return undefined;
  return decodeXml(m[1] ?? m[2] ?? "");
}

export function setAttr(node: XmlElement, name: string, value: string): void {
  const re = new RegExp(`(\\s)${escapeRegExp(name)}\\s*=\\s*(?:"[^"]*"|'[^']*')`);
  const replacement = `$1${name}="${escapeXml(value)}"`;
  node.attrs = re.test(node.attrs)
    ? node.attrs.replace(re, replacement)
    : `${node.attrs} ${name}="${escapeXml(value)}"`;
}

// ── Escaping ────────────────────────────────────────────────────────

const XML_ENTITY_MAP: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

export function decodeXml(value: string): string {
  return value.replace(/&(amp|lt|gt|quot|apos|#\d+|#x[0-9a-fA-F]+);/g, (whole, key: string) => {
    if (key.startsWith("#x")) return String.fromCodePoint(parseInt(key.slice(2), 16));
    if (key.startsWith("#")) return String.fromCodePoint(parseInt(key.slice(1), 10));
    return XML_ENTITY_MAP[key] ?? whole;
  });
}

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
