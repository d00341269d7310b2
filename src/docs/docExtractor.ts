import fs from 'node:fs';
import ts from 'typescript';

import type { AnyRecordType } from '../schema/record';

/** Documentation found around one field declaration. */
export type FieldDocs = {
  /** `/** ... *\/` block right above the field. */
  jsDoc?: string;
  /** `//` or `/* *\/` comment on the lines above the field. */
  commentAbove?: string;
  /** Comment trailing the field on the same line. */
  commentInline?: string;
};

/** Used for help text only; never changes how a field is parsed. */
export interface DocExtractor {
  lookup(record: AnyRecordType, fieldName: string): FieldDocs | undefined;
  recordDoc(record: AnyRecordType): string | undefined;
}

type MemberNode = ts.PropertyAssignment | ts.ShorthandPropertyAssignment | ts.PropertySignature | ts.PropertyDeclaration;

type Declaration = {
  sf: ts.SourceFile;
  statement: ts.Node;
  members: ReadonlyMap<string, MemberNode>;
};

function cleanBlockComment(text: string): string {
  const body = text.replace(/^\/\*\*?/, '').replace(/\*\/$/, '');
  const lines = body.split(/\r?\n/).map((l) => l.replace(/^\s*\* ?/, '').trimEnd());
  const untilTags: string[] = [];
  for (const l of lines) {
    if (l.trimStart().startsWith('@')) break;
    untilTags.push(l);
  }
  return untilTags.join('\n').trim();
}

function cleanLineComment(text: string): string {
  return text.replace(/^\/\/\s?/, '').trim();
}

function isMember(m: ts.Node): m is MemberNode {
  return ts.isPropertyAssignment(m) || ts.isShorthandPropertyAssignment(m) || ts.isPropertySignature(m) || ts.isPropertyDeclaration(m);
}

function collectMembers(nodes: readonly ts.Node[]): Map<string, MemberNode> {
  const out = new Map<string, MemberNode>();
  for (const m of nodes) {
    if (!isMember(m)) continue;
    if (ts.isIdentifier(m.name) || ts.isStringLiteral(m.name)) out.set(m.name.text, m);
  }
  return out;
}

/** First object literal in an initializer, i.e. the fields argument of `defineRecord(name, { ... })`. */
function firstObjectLiteral(node: ts.Node): ts.ObjectLiteralExpression | undefined {
  if (ts.isObjectLiteralExpression(node)) return node;
  let found: ts.ObjectLiteralExpression | undefined;
  node.forEachChild((child) => {
    found ??= firstObjectLiteral(child);
  });
  return found;
}

function findDeclaration(sf: ts.SourceFile, name: string): Declaration | undefined {
  for (const st of sf.statements) {
    if ((ts.isInterfaceDeclaration(st) || ts.isClassDeclaration(st)) && st.name?.text === name) {
      return { sf, statement: st, members: collectMembers(st.members) };
    }
    if (ts.isTypeAliasDeclaration(st) && st.name.text === name && ts.isTypeLiteralNode(st.type)) {
      return { sf, statement: st, members: collectMembers(st.type.members) };
    }
    if (ts.isVariableStatement(st)) {
      for (const d of st.declarationList.declarations) {
        if (!ts.isIdentifier(d.name) || d.name.text !== name || !d.initializer) continue;
        const literal = firstObjectLiteral(d.initializer);
        if (literal) return { sf, statement: st, members: collectMembers(literal.properties) };
      }
    }
  }
  return undefined;
}

function leadingDocs(sf: ts.SourceFile, node: ts.Node): Pick<FieldDocs, 'jsDoc' | 'commentAbove'> {
  const text = sf.getFullText();
  const ranges = ts.getLeadingCommentRanges(text, node.getFullStart()) ?? [];
  let jsDoc: string | undefined;
  const above: string[] = [];
  for (const r of ranges) {
    const raw = text.slice(r.pos, r.end);
    if (r.kind === ts.SyntaxKind.MultiLineCommentTrivia && raw.startsWith('/**')) {
      jsDoc = cleanBlockComment(raw);
    } else if (r.kind === ts.SyntaxKind.MultiLineCommentTrivia) {
      above.push(cleanBlockComment(raw));
    } else {
      above.push(cleanLineComment(raw));
    }
  }
  return { jsDoc: jsDoc || undefined, commentAbove: above.join('\n').trim() || undefined };
}

function inlineDoc(sf: ts.SourceFile, node: ts.Node): string | undefined {
  const text = sf.getFullText();
  let pos = node.getEnd();
  // `seed: 13, // comment` - the comment sits after the separator.
  const separator = /^[ \t]*[,;]/.exec(text.slice(pos));
  if (separator) pos += separator[0].length;
  const ranges = ts.getTrailingCommentRanges(text, pos) ?? [];
  const first = ranges[0];
  if (!first) return undefined;
  const raw = text.slice(first.pos, first.end);
  const cleaned = first.kind === ts.SyntaxKind.SingleLineCommentTrivia ? cleanLineComment(raw) : cleanBlockComment(raw);
  return cleaned || undefined;
}

/**
 * Reads field documentation from the TypeScript source that declares a record
 * (`record.docSource`). Parsed files are cached per extractor.
 */
export class TypeScriptDocExtractor implements DocExtractor {
  private readonly files = new Map<string, ts.SourceFile | null>();

  lookup(record: AnyRecordType, fieldName: string): FieldDocs | undefined {
    const decl = this.declarationOf(record);
    const member = decl?.members.get(fieldName);
    if (!decl || !member) return undefined;
    const docs: FieldDocs = { ...leadingDocs(decl.sf, member), commentInline: inlineDoc(decl.sf, member) };
    return docs.jsDoc || docs.commentAbove || docs.commentInline ? docs : undefined;
  }

  recordDoc(record: AnyRecordType): string | undefined {
    if (record.doc) return record.doc;
    const decl = this.declarationOf(record);
    return decl ? leadingDocs(decl.sf, decl.statement).jsDoc : undefined;
  }

  private declarationOf(record: AnyRecordType): Declaration | undefined {
    const source = record.docSource;
    if (!source) return undefined;
    const sf = this.sourceFile(source.file);
    return sf ? findDeclaration(sf, source.declaration ?? record.name) : undefined;
  }

  private sourceFile(file: string): ts.SourceFile | null {
    const cached = this.files.get(file);
    if (cached !== undefined) return cached;
    const sf = fs.existsSync(file)
      ? ts.createSourceFile(file, fs.readFileSync(file, 'utf8'), ts.ScriptTarget.Latest, true)
      : null;
    this.files.set(file, sf);
    return sf;
  }
}
