// Generic XML tree model
// The document codec and the record projections both work on this shape,
// never on the parser library's own output.

export type XmlText = {
  text: string;
};

export type XmlElement = {
  /**
   * Qualified name as written, e.g. "premis:event"
   */
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
};

export type XmlNode = XmlElement | XmlText;

export function isElement(node: XmlNode): node is XmlElement {
  return 'name' in node;
}

/**
 * Local part of a qualified name ("premis:event" -> "event")
 */
export function localName(name: string): string {
  const index = name.indexOf(':');
  return index === -1 ? name : name.slice(index + 1);
}

/**
 * Prefix part of a qualified name, or '' for an unprefixed name
 */
export function namePrefix(name: string): string {
  const index = name.indexOf(':');
  return index === -1 ? '' : name.slice(0, index);
}

export function qualifiedName(prefix: string, local: string): string {
  return prefix ? `${prefix}:${local}` : local;
}

export function createElement(
  name: string,
  children: XmlNode[] = [],
  attributes: Record<string, string> = {}
): XmlElement {
  return { name, attributes, children };
}

export function createTextElement(name: string, text: string): XmlElement {
  return { name, attributes: {}, children: [{ text }] };
}

export function childElements(element: XmlElement): XmlElement[] {
  return element.children.filter(isElement);
}

/**
 * All child elements with the given local name, in document order
 */
export function findChildren(element: XmlElement, local: string): XmlElement[] {
  return childElements(element).filter((child) => localName(child.name) === local);
}

export function findChild(element: XmlElement, local: string): XmlElement | undefined {
  return childElements(element).find((child) => localName(child.name) === local);
}

/**
 * Concatenated text content of an element's direct text children
 */
export function textOf(element: XmlElement): string {
  return element.children
    .filter((child): child is XmlText => !isElement(child))
    .map((child) => child.text)
    .join('');
}

/**
 * Text of the first child with the given local name, or undefined if absent
 */
export function childText(element: XmlElement, local: string): string | undefined {
  const child = findChild(element, local);
  return child ? textOf(child) : undefined;
}

/**
 * Texts of every child with the given local name
 */
export function childTexts(element: XmlElement, local: string): string[] {
  return findChildren(element, local).map(textOf);
}

/**
 * Value of the attribute with the given local name, whatever its prefix
 */
export function attributeByLocalName(element: XmlElement, local: string): string | undefined {
  for (const [name, value] of Object.entries(element.attributes)) {
    if (localName(name) === local) {
      return value;
    }
  }
  return undefined;
}
