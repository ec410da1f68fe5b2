import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { EditorDocument, Variable } from './types.js';

/**
 * Gist file codec.
 *
 * The uploaded file is plain SVG with the parameters stored as
 * `<defs><param name="…" value="…" /></defs>`, the first child of the root
 * `<svg>` element, so any parametric-svg renderer can read it back.
 *
 * Markup goes through an XML DOM. Empty elements are written as `<x />`, the
 * root always with an end tag; everything else is written by the serializer.
 */

export type FileContentsError =
  | { readonly code: 'NO_SVG_ROOT'; readonly message: string }
  | { readonly code: 'INVALID_MARKUP'; readonly message: string };

const SVG_MIME = 'image/svg+xml';
const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

interface SvgTree {
  readonly doc: Document;
  readonly root: Element;
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function isBlankText(node: Node | null): node is Text {
  return node !== null && node.nodeType === TEXT_NODE && (node.nodeValue ?? '').trim() === '';
}

function invalidMarkup(problem: string): FileContentsError {
  return { code: 'INVALID_MARKUP', message: `The markup is not well-formed XML (${problem})` };
}

function elementChildren(node: Node): Element[] {
  return Array.from(node.childNodes).filter(isElement);
}

function parseSvg(markup: string): Result<SvgTree, FileContentsError> {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: (level: string, message: unknown) => {
      if (level !== 'warning') problems.push(String(message));
    },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(markup, SVG_MIME);
  } catch (e) {
    return err(invalidMarkup(e instanceof Error ? e.message : String(e)));
  }
  const [problem] = problems;
  if (problem !== undefined) return err(invalidMarkup(problem));

  const root: Element | null = doc.documentElement;
  if (root === null || root.localName !== 'svg') {
    return err({ code: 'NO_SVG_ROOT', message: 'The markup has no <svg> element' });
  }
  return ok({ doc, root });
}

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

type LeafWriter = (node: Node) => string;

function writeNode(node: Node, writeLeaf: LeafWriter, isRoot: boolean): string {
  if (!isElement(node)) return writeLeaf(node);

  const name = node.tagName;
  const attributes = Array.from(node.attributes)
    .map((attr) => ` ${attr.name}="${escapeAttribute(attr.value)}"`)
    .join('');
  if (node.childNodes.length === 0 && !isRoot) return `<${name}${attributes} />`;

  const children = Array.from(node.childNodes)
    .map((child) => writeNode(child, writeLeaf, false))
    .join('');
  return `<${name}${attributes}>${children}</${name}>`;
}

function writeDocument({ doc, root }: SvgTree): string {
  const serializer = new XMLSerializer();
  const writeLeaf: LeafWriter = (node) => serializer.serializeToString(node);
  return Array.from(doc.childNodes)
    .map((node) => writeNode(node, writeLeaf, node === root))
    .join('');
}

export function serializeFileContents(doc: EditorDocument): Result<string, FileContentsError> {
  return parseSvg(doc.markup).map((tree) => {
    if (doc.variables.length === 0) return doc.markup;

    const namespace = tree.root.namespaceURI;
    const defs = tree.doc.createElementNS(namespace, 'defs');
    for (const variable of doc.variables) {
      const param = tree.doc.createElementNS(namespace, 'param');
      param.setAttribute('name', variable.name);
      param.setAttribute('value', variable.value);
      defs.appendChild(param);
    }
    tree.root.insertBefore(defs, tree.root.firstChild);
    return writeDocument(tree);
  });
}

function readParams(defs: Element): Variable[] | null {
  const onlyParams = Array.from(defs.childNodes).every(
    (child) => isBlankText(child) || (isElement(child) && child.localName === 'param')
  );
  const params = elementChildren(defs);
  if (!onlyParams || params.length === 0) return null;

  const variables: Variable[] = [];
  for (const param of params) {
    // getAttribute answers '' for a missing attribute.
    if (!param.hasAttribute('name') || !param.hasAttribute('value')) return null;
    variables.push({ name: param.getAttribute('name') ?? '', value: param.getAttribute('value') ?? '' });
  }
  return variables;
}

/**
 * Inverse of {@link serializeFileContents}. A file whose first element is not
 * a `<defs>` holding only `<param>`s is returned whole as markup with no
 * variables.
 */
export function parseFileContents(content: string): EditorDocument {
  const whole: EditorDocument = { markup: content, variables: [] };
  const parsed = parseSvg(content);
  if (parsed.isErr()) return whole;

  const tree = parsed.value;
  const defs = elementChildren(tree.root)[0];
  if (defs === undefined || defs.localName !== 'defs') return whole;

  const variables = readParams(defs);
  if (variables === null) return whole;

  const trailing = defs.nextSibling;
  if (isBlankText(trailing)) tree.root.removeChild(trailing);
  tree.root.removeChild(defs);
  return { markup: writeDocument(tree), variables };
}
