/**
 * java-frontend – Parser core
 *
 * Recursive-descent parser from a token stream to a `CompilationUnit`.
 *
 * Responsibilities:
 *  - one method per grammar production, each wrapped by `production()`
 *    for depth limiting and optional tracing;
 *  - bounded backtracking through the lookahead cursor where the grammar
 *    is ambiguous (local declarations, lambdas, casts, patterns);
 *  - building every node once, from already-parsed children.
 *
 * Context flags:
 *  - `yieldAllowed`: `yield` is a statement only inside an arrow-rule block;
 *  - `arrowLambdaAllowed`: off while parsing case labels and guards, where
 *    `name ->` ends the label instead of starting a lambda.
 *
 * License: Apache-2.0
 */

import type {
  Annotation,
  ArrayCreator,
  ArrayInitializer,
  BasicType,
  BlockStatement,
  CatchClause,
  ClassCreator,
  CompilationUnit,
  ConstructorDeclaration,
  DefaultLabel,
  ElementArrayValue,
  ElementValue,
  ElementValuePair,
  EnhancedForControl,
  EnumConstantDeclaration,
  Expression,
  ForControl,
  FormalParameter,
  Import,
  InferredFormalParameter,
  InnerClassCreator,
  LambdaExpression,
  LocalVariableDeclaration,
  MemberDeclaration,
  MethodDeclaration,
  PackageDeclaration,
  Pattern,
  Primary,
  RecordPattern,
  ReferenceType,
  Selector,
  Statement,
  SwitchExpression,
  SwitchLabel,
  SwitchRule,
  SwitchStatementCase,
  ThrowStatement,
  TryResource,
  TryStatement,
  Type,
  TypeArgument,
  TypeDeclaration,
  TypeParameter,
  TypePattern,
  VariableDeclaration,
  VariableDeclarator,
  VariableInitializer,
} from './ast';
import { LookaheadCursor } from './cursor';
import { JavaSyntaxError, createInternalError, createSyntaxError } from './errors';
import type { NormalizedParseOptions } from './options';
import type { InfixStep } from './precedence';
import { foldBinary, precedenceOf } from './precedence';
import type { ExpectedToken, Lexeme, Position, Token } from './tokens';
import {
  ASSIGNMENT_OPERATORS,
  END_OF_INPUT,
  INFIX_OPERATORS,
  POSTFIX_OPERATORS,
  PREFIX_OPERATORS,
  describeExpected,
  isEndOfInput,
  isLiteralToken,
  kind,
  matchesExpected,
  tok,
} from './tokens';
import { ProductionTracer } from '../utils/trace';

/////////////////////
// Local types     //
/////////////////////

/** A string is shorthand for `tok(text)`. */
type Expectation = ExpectedToken | string;

/** Statements that can carry a label. */
type LabelableStatement = Exclude<Statement, TypeDeclaration>;

type MemberContext = 'class' | 'interface' | 'annotation' | 'record';

interface DeclarationHead {
  readonly position: Position;
  readonly modifiers: readonly string[];
  readonly annotations: readonly Annotation[];
  readonly documentation: string | null;
}

interface VariableModifiers {
  readonly modifiers: readonly string[];
  readonly annotations: readonly Annotation[];
}

interface SwitchLabelHead {
  readonly position: Position;
  readonly labels: readonly SwitchLabel[];
  readonly guard: Expression | null;
  readonly arrow: boolean;
}

interface SwitchBody {
  readonly groups: readonly SwitchStatementCase[];
  readonly rules: readonly SwitchRule[];
}

interface ModifierScan {
  /** Index of the first token after modifiers and annotations. */
  readonly index: number;
  readonly sawAnnotation: boolean;
  readonly sawNonFinalModifier: boolean;
}

interface TypeSegment {
  readonly position: Position;
  readonly name: string;
  readonly arguments: readonly TypeArgument[] | null;
}

const TYPE_DECLARATION_KEYWORDS: ReadonlySet<string> = new Set(['class', 'interface', 'enum']);

/** Tokens that may follow a reference-type cast's `)` only as binary operators. */
const NOT_AFTER_REFERENCE_CAST: ReadonlySet<string> = new Set(['+', '-', '++', '--']);

/** `shift` and tighter may not directly follow an instanceof target. */
const RELATIONAL_LEVEL = precedenceOf('instanceof');

function decoration(position: Position) {
  return {
    position,
    qualifier: null,
    selectors: [],
    prefixOperators: [],
    postfixOperators: [],
  };
}

/////////////////////
// Parser class    //
/////////////////////

export class Parser {
  private readonly tokens: LookaheadCursor<Lexeme>;
  private readonly options: NormalizedParseOptions;
  private readonly tracer: ProductionTracer | null;

  private depth = 0;
  private yieldAllowed = false;
  private arrowLambdaAllowed = true;

  constructor(tokens: Iterable<Lexeme>, options: NormalizedParseOptions) {
    this.tokens = new LookaheadCursor<Lexeme>(tokens, END_OF_INPUT);
    this.options = options;
    this.tracer = options.debug ? new ProductionTracer(options.trace) : null;
  }

  /////////////////////
  // Public entries  //
  /////////////////////

  parseUnit(): CompilationUnit {
    const unit = this.parseCompilationUnit();
    this.expectEnd();
    return unit;
  }

  parseStandaloneExpression(): Expression {
    const expression = this.parseExpression();
    this.expectEnd();
    return expression;
  }

  parseStandaloneType(): Type {
    const type = this.parseType();
    this.expectEnd();
    return type;
  }

  ////////////////////////////
  // Token helpers          //
  ////////////////////////////

  private peek(offset = 0): Lexeme {
    return this.tokens.peek(offset);
  }

  /** Consume one token; end of input is a syntax error. */
  private advance(): Token {
    const token = this.tokens.peek();
    if (isEndOfInput(token)) throw this.illegal('Unexpected end of input', token);
    this.tokens.advance();
    return token;
  }

  /**
   * Consume one token per expectation, failing on the first mismatch.
   * Returns the last token consumed.
   */
  private accept(...expected: Expectation[]): Token {
    const [first, ...rest] = expected;
    if (first === undefined) {
      throw createInternalError({ message: 'accept() needs at least one expected token' });
    }
    let last = this.acceptOne(toExpected(first));
    for (const e of rest) last = this.acceptOne(toExpected(e));
    return last;
  }

  private acceptOne(expected: ExpectedToken): Token {
    const token = this.tokens.peek();
    if (isEndOfInput(token)) {
      throw this.illegal('Unexpected end of input', token, `expected ${describeExpected(expected)}`);
    }
    if (!matchesExpected(token, expected)) {
      throw this.illegal(`Expected ${describeExpected(expected)}`, token);
    }
    this.tokens.advance();
    return token;
  }

  /** Pure lookahead: do the next tokens match, in order? */
  private wouldAccept(...expected: Expectation[]): boolean {
    return expected.every((e, i) => matchesExpected(this.peek(i), toExpected(e)));
  }

  /** Consume the tokens only if all of them match. */
  private tryAccept(...expected: Expectation[]): boolean {
    if (!this.wouldAccept(...expected)) return false;
    for (let i = 0; i < expected.length; i++) this.tokens.advance();
    return true;
  }

  /** Position of the next token; end of input is a syntax error. */
  private here(): Position {
    const token = this.peek();
    if (token.position === null) throw this.illegal('Unexpected end of input', token);
    return token.position;
  }

  private illegal(description: string, at: Lexeme = this.peek(), note?: string): JavaSyntaxError {
    return createSyntaxError({ description, at, note, source: this.options.source });
  }

  private expectEnd(): void {
    const token = this.peek();
    if (!isEndOfInput(token)) throw this.illegal('Expected end of input', token);
  }

  private isWord(offset: number, word: string): boolean {
    const token = this.peek(offset);
    return token.kind === 'identifier' && token.text === word;
  }

  /** `@Name`, but not `@interface`. */
  private isAnnotationAt(offset: number): boolean {
    return this.peek(offset).kind === 'annotation' && this.peek(offset + 1).text !== 'interface';
  }

  private isRecordDeclarationAt(offset: number): boolean {
    if (!this.isWord(offset, 'record') || this.peek(offset + 1).kind !== 'identifier') {
      return false;
    }
    const after = this.peek(offset + 2).text;
    return after === '(' || after === '<';
  }

  private startsTypeDeclarationAt(offset: number): boolean {
    const token = this.peek(offset);
    if (token.kind === 'keyword' && TYPE_DECLARATION_KEYWORDS.has(token.text)) return true;
    if (token.kind === 'annotation' && this.peek(offset + 1).text === 'interface') return true;
    return this.isRecordDeclarationAt(offset);
  }

  /**
   * Look past modifiers and annotations (including their parenthesized
   * arguments) without consuming anything.
   */
  private scanModifiers(from: number): ModifierScan {
    let i = from;
    let sawAnnotation = false;
    let sawNonFinalModifier = false;

    for (;;) {
      const token = this.peek(i);
      if (token.kind === 'modifier') {
        if (token.text !== 'final') sawNonFinalModifier = true;
        i++;
        continue;
      }
      if (!this.isAnnotationAt(i)) break;

      sawAnnotation = true;
      i += 2;
      while (this.peek(i).text === '.' && this.peek(i + 1).kind === 'identifier') i += 2;

      if (this.peek(i).text === '(') {
        let parens = 1;
        i++;
        while (parens > 0) {
          const inner = this.peek(i);
          if (isEndOfInput(inner)) break;
          if (inner.text === '(') parens++;
          else if (inner.text === ')') parens--;
          i++;
        }
      }
    }

    return { index: i, sawAnnotation, sawNonFinalModifier };
  }

  /**
   * Run `body` speculatively. Syntax errors roll the cursor back and yield
   * `null`; anything else propagates.
   */
  private attempt<R>(body: () => R): R | null {
    try {
      return this.tokens.speculate(body);
    } catch (err) {
      if (err instanceof JavaSyntaxError) return null;
      throw err;
    }
  }

  private withArrowLambda<R>(allowed: boolean, body: () => R): R {
    const saved = this.arrowLambdaAllowed;
    this.arrowLambdaAllowed = allowed;
    try {
      return body();
    } finally {
      this.arrowLambdaAllowed = saved;
    }
  }

  /**
   * Wrap a grammar production: enforce the depth limit and, in debug mode,
   * trace entry and exit.
   */
  private production<R>(name: string, body: () => R): R {
    const depth = this.depth;
    if (depth >= this.options.maxDepth) {
      throw this.illegal('Maximum nesting depth exceeded');
    }
    this.depth = depth + 1;

    const tracer = this.tracer;
    if (tracer === null) {
      try {
        return body();
      } finally {
        this.depth = depth;
      }
    }

    const start = this.peek();
    tracer.enter(depth, name, start);
    let failure: string | null = null;
    try {
      return body();
    } catch (err) {
      failure = err instanceof JavaSyntaxError ? err.description : String(err);
      throw err;
    } finally {
      this.depth = depth;
      tracer.exit(depth, name, start, this.tokens.last(), failure);
    }
  }

  ////////////////////////////
  // Identifiers            //
  ////////////////////////////

  private parseIdentifier(): string {
    return this.accept(kind('identifier')).text;
  }

  private parseQualifiedIdentifier(): string {
    return this.production('parseQualifiedIdentifier', () => {
      const names = [this.parseIdentifier()];
      while (this.wouldAccept('.', kind('identifier'))) {
        this.advance();
        names.push(this.parseIdentifier());
      }
      return names.join('.');
    });
  }

  private parseQualifiedIdentifierList(): string[] {
    return this.production('parseQualifiedIdentifierList', () => {
      const names = [this.parseQualifiedIdentifier()];
      while (this.tryAccept(',')) names.push(this.parseQualifiedIdentifier());
      return names;
    });
  }

  ////////////////////////////
  // Compilation unit       //
  ////////////////////////////

  private parseCompilationUnit(): CompilationUnit {
    return this.production('parseCompilationUnit', () => {
      const first = this.peek();
      const position = first.position ?? { line: 1, column: 1 };

      let pkg: PackageDeclaration | null = null;
      const scan = this.scanModifiers(0);
      if (!scan.sawNonFinalModifier && this.peek(scan.index).text === 'package') {
        pkg = this.parsePackageDeclaration();
      }

      const imports: Import[] = [];
      while (this.wouldAccept('import')) {
        imports.push(this.parseImportDeclaration());
      }

      const types: TypeDeclaration[] = [];
      const methods: MethodDeclaration[] = [];

      while (!isEndOfInput(this.peek())) {
        if (this.tryAccept(';')) continue;

        const ahead = this.scanModifiers(0);
        if (this.startsTypeDeclarationAt(ahead.index)) {
          types.push(this.parseClassOrInterfaceDeclaration());
        } else {
          methods.push(this.parseTopLevelMethodDeclaration());
        }
      }

      return {
        type: 'CompilationUnit',
        position,
        package: pkg,
        imports,
        types,
        methods,
      };
    });
  }

  private parsePackageDeclaration(): PackageDeclaration {
    return this.production('parsePackageDeclaration', () => {
      const position = this.here();
      const documentation = this.peek().javadoc;
      const annotations = this.parseAnnotations();
      this.accept('package');
      const name = this.parseQualifiedIdentifier();
      this.accept(';');
      return { type: 'PackageDeclaration', position, name, annotations, documentation };
    });
  }

  private parseImportDeclaration(): Import {
    return this.production('parseImportDeclaration', () => {
      const position = this.here();
      this.accept('import');
      const isStatic = this.tryAccept('static');

      const names = [this.parseIdentifier()];
      let wildcard = false;
      while (this.tryAccept('.')) {
        if (this.tryAccept('*')) {
          wildcard = true;
          break;
        }
        names.push(this.parseIdentifier());
      }
      this.accept(';');

      return { type: 'Import', position, path: names.join('.'), static: isStatic, wildcard };
    });
  }

  private parseTopLevelMethodDeclaration(): MethodDeclaration {
    return this.production('parseTopLevelMethodDeclaration', () => {
      const head = this.parseDeclarationHead();

      let typeParameters: TypeParameter[] = [];
      if (this.wouldAccept('<')) typeParameters = this.parseTypeParameters();

      const returnType = this.tryAccept('void') ? null : this.parseType();
      const name = this.parseIdentifier();
      return this.parseMethodRest(head, typeParameters, returnType, name);
    });
  }

  ////////////////////////////
  // Modifiers & annotations//
  ////////////////////////////

  /**
   * Modifiers and annotations before a declaration. The doc comment is the
   * one attached to the declaration's first token.
   */
  private parseDeclarationHead(): DeclarationHead {
    return this.production('parseModifiers', () => {
      const position = this.here();
      const documentation = this.peek().javadoc;
      const modifiers: string[] = [];
      const annotations: Annotation[] = [];

      for (;;) {
        const token = this.peek();
        if (token.kind === 'modifier') {
          this.advance();
          if (!modifiers.includes(token.text)) modifiers.push(token.text);
        } else if (this.isAnnotationAt(0)) {
          annotations.push(this.parseAnnotation());
        } else {
          break;
        }
      }

      return { position, modifiers, annotations, documentation };
    });
  }

  /** `final` and annotations, as allowed on variables and parameters. */
  private parseVariableModifiers(): VariableModifiers {
    return this.production('parseVariableModifiers', () => {
      const modifiers: string[] = [];
      const annotations: Annotation[] = [];

      for (;;) {
        if (this.tryAccept('final')) {
          if (!modifiers.includes('final')) modifiers.push('final');
        } else if (this.isAnnotationAt(0)) {
          annotations.push(this.parseAnnotation());
        } else {
          break;
        }
      }

      return { modifiers, annotations };
    });
  }

  private parseAnnotations(): Annotation[] {
    const annotations: Annotation[] = [];
    while (this.isAnnotationAt(0)) annotations.push(this.parseAnnotation());
    return annotations;
  }

  private parseAnnotation(): Annotation {
    return this.production('parseAnnotation', () => {
      const position = this.here();
      this.accept(kind('annotation'));
      const name = this.parseQualifiedIdentifier();

      let element: ElementValue | ElementValuePair[] | null = null;
      if (this.tryAccept('(')) {
        if (!this.wouldAccept(')')) element = this.parseAnnotationElement();
        this.accept(')');
      }

      return { type: 'Annotation', position, name, element };
    });
  }

  private parseAnnotationElement(): ElementValue | ElementValuePair[] {
    return this.production('parseAnnotationElement', () => {
      if (!this.wouldAccept(kind('identifier'), '=')) {
        return this.parseElementValue();
      }

      const pairs: ElementValuePair[] = [];
      do {
        const position = this.here();
        const name = this.parseIdentifier();
        this.accept('=');
        pairs.push({ type: 'ElementValuePair', position, name, value: this.parseElementValue() });
      } while (this.tryAccept(','));
      return pairs;
    });
  }

  private parseElementValue(): ElementValue {
    return this.production('parseElementValue', () => {
      if (this.isAnnotationAt(0)) return this.parseAnnotation();
      if (this.wouldAccept('{')) return this.parseElementValueArrayInitializer();
      return this.parseExpressionl();
    });
  }

  private parseElementValueArrayInitializer(): ElementArrayValue {
    return this.production('parseElementValueArrayInitializer', () => {
      const position = this.here();
      this.accept('{');
      const values: ElementValue[] = [];
      while (!this.wouldAccept('}')) {
        values.push(this.parseElementValue());
        if (!this.tryAccept(',')) break;
      }
      this.accept('}');
      return { type: 'ElementArrayValue', position, values };
    });
  }

  ////////////////////////////
  // Type declarations      //
  ////////////////////////////

  private parseClassOrInterfaceDeclaration(): TypeDeclaration {
    return this.production('parseClassOrInterfaceDeclaration', () =>
      this.parseTypeDeclarationBody(this.parseDeclarationHead()),
    );
  }

  private parseTypeDeclarationBody(head: DeclarationHead): TypeDeclaration {
    const token = this.peek();
    if (token.text === 'class' && token.kind === 'keyword') return this.parseClassDeclaration(head);
    if (token.text === 'enum' && token.kind === 'keyword') return this.parseEnumDeclaration(head);
    if (token.text === 'interface' && token.kind === 'keyword') return this.parseInterfaceDeclaration(head);
    if (token.kind === 'annotation') return this.parseAnnotationTypeDeclaration(head);
    if (this.isRecordDeclarationAt(0)) return this.parseRecordDeclaration(head);
    throw this.illegal('Expected type declaration');
  }

  private parseClassDeclaration(head: DeclarationHead): TypeDeclaration {
    return this.production('parseNormalClassDeclaration', () => {
      this.accept('class');
      const name = this.parseIdentifier();
      const typeParameters = this.wouldAccept('<') ? this.parseTypeParameters() : [];
      const superclass = this.tryAccept('extends') ? this.parseReferenceType() : null;
      const interfaces = this.tryAccept('implements') ? this.parseTypeList() : [];
      const permits = this.parsePermits();
      const body = this.parseClassBody(name, 'class');

      return {
        type: 'ClassDeclaration',
        ...head,
        name,
        typeParameters,
        extends: superclass,
        implements: interfaces,
        permits,
        body,
      };
    });
  }

  private parseInterfaceDeclaration(head: DeclarationHead): TypeDeclaration {
    return this.production('parseNormalInterfaceDeclaration', () => {
      this.accept('interface');
      const name = this.parseIdentifier();
      const typeParameters = this.wouldAccept('<') ? this.parseTypeParameters() : [];
      const superinterfaces = this.tryAccept('extends') ? this.parseTypeList() : [];
      const permits = this.parsePermits();
      const body = this.parseClassBody(name, 'interface');

      return {
        type: 'InterfaceDeclaration',
        ...head,
        name,
        typeParameters,
        extends: superinterfaces,
        permits,
        body,
      };
    });
  }

  private parsePermits(): ReferenceType[] {
    if (!this.isWord(0, 'permits')) return [];
    this.advance();
    return this.parseTypeList();
  }

  private parseEnumDeclaration(head: DeclarationHead): TypeDeclaration {
    return this.production('parseEnumDeclaration', () => {
      this.accept('enum');
      const name = this.parseIdentifier();
      const interfaces = this.tryAccept('implements') ? this.parseTypeList() : [];

      this.accept('{');
      const constants: EnumConstantDeclaration[] = [];
      while (this.peek().kind === 'identifier' || this.isAnnotationAt(0)) {
        constants.push(this.parseEnumConstant());
        if (!this.tryAccept(',')) break;
      }

      const body: MemberDeclaration[] = [];
      if (this.tryAccept(';')) {
        while (!this.wouldAccept('}') && !isEndOfInput(this.peek())) {
          const member = this.parseClassBodyDeclaration(name, 'class');
          if (member) body.push(member);
        }
      }
      this.accept('}');

      return {
        type: 'EnumDeclaration',
        ...head,
        name,
        implements: interfaces,
        constants,
        body,
      };
    });
  }

  private parseEnumConstant(): EnumConstantDeclaration {
    return this.production('parseEnumConstant', () => {
      const position = this.here();
      const documentation = this.peek().javadoc;
      const annotations = this.parseAnnotations();
      const name = this.parseIdentifier();
      const args = this.wouldAccept('(') ? this.parseArguments() : null;
      const body = this.wouldAccept('{') ? this.parseClassBody(name, 'class') : null;

      return {
        type: 'EnumConstantDeclaration',
        position,
        name,
        annotations,
        documentation,
        arguments: args,
        body,
      };
    });
  }

  private parseAnnotationTypeDeclaration(head: DeclarationHead): TypeDeclaration {
    return this.production('parseAnnotationTypeDeclaration', () => {
      this.accept(kind('annotation'), 'interface');
      const name = this.parseIdentifier();
      const body = this.parseClassBody(name, 'annotation');
      return { type: 'AnnotationDeclaration', ...head, name, body };
    });
  }

  private parseRecordDeclaration(head: DeclarationHead): TypeDeclaration {
    return this.production('parseRecordDeclaration', () => {
      this.accept(kind('identifier'));
      const name = this.parseIdentifier();
      const typeParameters = this.wouldAccept('<') ? this.parseTypeParameters() : [];

      this.accept('(');
      const components: FormalParameter[] = [];
      while (!this.wouldAccept(')')) {
        components.push(this.parseFormalParameter());
        if (!this.tryAccept(',')) break;
      }
      this.accept(')');

      const interfaces = this.tryAccept('implements') ? this.parseTypeList() : [];
      const body = this.parseClassBody(name, 'record');

      return {
        type: 'RecordDeclaration',
        ...head,
        name,
        typeParameters,
        components,
        implements: interfaces,
        body,
      };
    });
  }

  private parseTypeList(): ReferenceType[] {
    return this.production('parseTypeList', () => {
      const types = [this.parseReferenceType()];
      while (this.tryAccept(',')) types.push(this.parseReferenceType());
      return types;
    });
  }

  ////////////////////////////
  // Class bodies           //
  ////////////////////////////

  private parseClassBody(owner: string, context: MemberContext): MemberDeclaration[] {
    return this.production('parseClassBody', () => {
      this.accept('{');
      const members: MemberDeclaration[] = [];
      while (!this.wouldAccept('}') && !isEndOfInput(this.peek())) {
        const member = this.parseClassBodyDeclaration(owner, context);
        if (member) members.push(member);
      }
      this.accept('}');
      return members;
    });
  }

  /** `null` for a stray `;`. */
  private parseClassBodyDeclaration(
    owner: string,
    context: MemberContext,
  ): MemberDeclaration | null {
    return this.production('parseClassBodyDeclaration', () => {
      if (this.tryAccept(';')) return null;

      const initializerAllowed = context === 'class' || context === 'record';
      if (initializerAllowed && this.wouldAccept('static', '{')) {
        const position = this.here();
        this.advance();
        return { type: 'InitializerBlock', position, static: true, body: this.parseBlock() };
      }
      if (initializerAllowed && this.wouldAccept('{')) {
        const position = this.here();
        return { type: 'InitializerBlock', position, static: false, body: this.parseBlock() };
      }

      return this.parseMemberDeclaration(this.parseDeclarationHead(), owner, context);
    });
  }

  private parseMemberDeclaration(
    head: DeclarationHead,
    owner: string,
    context: MemberContext,
  ): MemberDeclaration {
    return this.production('parseMemberDeclaration', () => {
      if (this.startsTypeDeclarationAt(0)) {
        return this.parseTypeDeclarationBody(head);
      }

      if (this.wouldAccept('<')) {
        return this.parseGenericMethodOrConstructor(head, context);
      }

      if (this.tryAccept('void')) {
        const name = this.parseIdentifier();
        return this.parseMethodRest(head, [], null, name);
      }

      const constructorsAllowed = context === 'class' || context === 'record';
      if (constructorsAllowed && this.wouldAccept(kind('identifier'), '(')) {
        return this.parseConstructorRest(head, []);
      }

      if (
        context === 'record' &&
        this.wouldAccept(kind('identifier'), '{') &&
        this.peek().text === owner
      ) {
        const name = this.parseIdentifier();
        return {
          type: 'ConstructorDeclaration',
          ...head,
          name,
          typeParameters: [],
          parameters: [],
          throws: [],
          body: this.parseBlock(),
          compact: true,
        };
      }

      const memberType = this.parseType();

      if (this.wouldAccept(kind('identifier'), '(')) {
        const name = this.parseIdentifier();
        if (context === 'annotation') {
          return this.parseAnnotationMethodRest(head, memberType, name);
        }
        return this.parseMethodRest(head, [], memberType, name);
      }

      const constant = context === 'interface' || context === 'annotation';
      const declarators = this.parseVariableDeclarators(constant);
      this.accept(';');

      if (constant) {
        return { type: 'ConstantDeclaration', ...head, fieldType: memberType, declarators };
      }
      return { type: 'FieldDeclaration', ...head, fieldType: memberType, declarators };
    });
  }

  private parseGenericMethodOrConstructor(
    head: DeclarationHead,
    context: MemberContext,
  ): MethodDeclaration | ConstructorDeclaration {
    return this.production('parseGenericMethodOrConstructorDecl', () => {
      const typeParameters = this.parseTypeParameters();

      if (context !== 'interface' && this.wouldAccept(kind('identifier'), '(')) {
        return this.parseConstructorRest(head, typeParameters);
      }

      const returnType = this.tryAccept('void') ? null : this.parseType();
      const name = this.parseIdentifier();
      return this.parseMethodRest(head, typeParameters, returnType, name);
    });
  }

  /**
   * Parameters, extra dimensions, `throws` and body (or `;`) after a
   * method name.
   */
  private parseMethodRest(
    head: DeclarationHead,
    typeParameters: readonly TypeParameter[],
    returnType: Type | null,
    name: string,
  ): MethodDeclaration {
    return this.production('parseMethodDeclaratorRest', () => {
      const parameters = this.parseFormalParameters();
      const extraDimensions = this.parseArrayDimension();
      if (returnType === null && extraDimensions > 0) {
        throw this.illegal('Array dimensions on a void method');
      }
      const throws = this.tryAccept('throws') ? this.parseQualifiedIdentifierList() : [];

      let body: Statement[] | null = null;
      if (this.wouldAccept('{')) {
        body = this.parseBlock();
      } else {
        this.accept(';');
      }

      return {
        type: 'MethodDeclaration',
        ...head,
        name,
        typeParameters,
        returnType: returnType === null ? null : withDimensions(returnType, extraDimensions),
        parameters,
        throws,
        body,
      };
    });
  }

  private parseConstructorRest(
    head: DeclarationHead,
    typeParameters: readonly TypeParameter[],
  ): ConstructorDeclaration {
    return this.production('parseConstructorDeclaratorRest', () => {
      const name = this.parseIdentifier();
      const parameters = this.parseFormalParameters();
      const throws = this.tryAccept('throws') ? this.parseQualifiedIdentifierList() : [];
      const body = this.parseBlock();

      return {
        type: 'ConstructorDeclaration',
        ...head,
        name,
        typeParameters,
        parameters,
        throws,
        body,
        compact: false,
      };
    });
  }

  private parseAnnotationMethodRest(
    head: DeclarationHead,
    returnType: Type,
    name: string,
  ): MemberDeclaration {
    return this.production('parseAnnotationMethodRest', () => {
      this.accept('(', ')');
      const dimensions = this.parseArrayDimension();
      const defaultValue = this.tryAccept('default') ? this.parseElementValue() : null;
      this.accept(';');

      return {
        type: 'AnnotationMethod',
        ...head,
        name,
        returnType,
        dimensions,
        default: defaultValue,
      };
    });
  }

  ////////////////////////////
  // Parameters & variables //
  ////////////////////////////

  private parseFormalParameters(): FormalParameter[] {
    return this.production('parseFormalParameters', () => {
      this.accept('(');
      const parameters: FormalParameter[] = [];
      if (this.tryAccept(')')) return parameters;

      do {
        parameters.push(this.parseFormalParameter());
      } while (this.tryAccept(','));

      this.accept(')');
      return parameters;
    });
  }

  private parseFormalParameter(): FormalParameter {
    return this.production('parseFormalParameter', () => {
      const position = this.here();
      const { modifiers, annotations } = this.parseVariableModifiers();
      const declaredType = this.parseType();
      const varargs = this.tryAccept('...');
      const name = this.parseIdentifier();
      const dimensions = this.parseArrayDimension();

      return {
        type: 'FormalParameter',
        position,
        modifiers,
        annotations,
        parameterType: withDimensions(declaredType, dimensions),
        name,
        varargs,
      };
    });
  }

  /**
   * `a = 1, b[] = {2}`. With `requireInitializer`, every declarator needs
   * an `=` (interface and annotation constants).
   */
  private parseVariableDeclarators(requireInitializer = false): VariableDeclarator[] {
    return this.production('parseVariableDeclarators', () => {
      const declarators = [this.parseVariableDeclarator(requireInitializer)];
      while (this.tryAccept(',')) declarators.push(this.parseVariableDeclarator(requireInitializer));
      return declarators;
    });
  }

  private parseVariableDeclarator(requireInitializer = false): VariableDeclarator {
    return this.production('parseVariableDeclarator', () => {
      const position = this.here();
      const name = this.parseIdentifier();
      const dimensions = this.parseArrayDimension();

      let initializer: VariableInitializer | null = null;
      if (requireInitializer) {
        this.accept('=');
        initializer = this.parseVariableInitializer();
      } else if (this.tryAccept('=')) {
        initializer = this.parseVariableInitializer();
      }

      return { type: 'VariableDeclarator', position, name, dimensions, initializer };
    });
  }

  private parseVariableInitializer(): VariableInitializer {
    return this.production('parseVariableInitializer', () =>
      this.wouldAccept('{') ? this.parseArrayInitializer() : this.parseExpression(),
    );
  }

  private parseArrayInitializer(): ArrayInitializer {
    return this.production('parseArrayInitializer', () => {
      const position = this.here();
      this.accept('{');
      const initializers: VariableInitializer[] = [];
      while (!this.wouldAccept('}')) {
        initializers.push(this.parseVariableInitializer());
        if (!this.tryAccept(',')) break;
      }
      this.accept('}');
      return { type: 'ArrayInitializer', position, initializers };
    });
  }

  ////////////////////////////
  // Types                  //
  ////////////////////////////

  private parseType(): Type {
    return this.production('parseType', () => {
      const token = this.peek();
      if (token.kind === 'basic-type') {
        const position = this.here();
        this.advance();
        return {
          type: 'BasicType',
          position,
          name: token.text,
          dimensions: this.parseArrayDimension(),
        };
      }
      if (token.kind === 'identifier') {
        const segments = this.parseTypeSegments(false);
        return buildReferenceChain(segments, this.parseArrayDimension());
      }
      throw this.illegal('Expected type');
    });
  }

  private parseReferenceType(): ReferenceType {
    return this.production('parseReferenceType', () =>
      buildReferenceChain(this.parseTypeSegments(false), 0),
    );
  }

  /**
   * `A<B>.C<D>` as segments. With `diamond`, empty `<>` is accepted
   * (class instance creation).
   */
  private parseTypeSegments(diamond: boolean): TypeSegment[] {
    const segments: TypeSegment[] = [];
    do {
      const position = this.here();
      const name = this.parseIdentifier();
      let args: TypeArgument[] | null = null;
      if (this.wouldAccept('<')) {
        args = diamond ? this.parseTypeArgumentsOrDiamond() : this.parseTypeArguments();
      }
      segments.push({ position, name, arguments: args });
    } while (this.wouldAccept('.', kind('identifier')) && this.tryAccept('.'));
    return segments;
  }

  private parseTypeArguments(): TypeArgument[] {
    return this.production('parseTypeArguments', () => {
      this.accept('<');
      const args = [this.parseTypeArgument()];
      while (this.tryAccept(',')) args.push(this.parseTypeArgument());
      this.accept('>');
      return args;
    });
  }

  private parseTypeArgument(): TypeArgument {
    return this.production('parseTypeArgument', () => {
      const position = this.here();

      if (this.tryAccept('?')) {
        if (this.tryAccept('extends')) {
          return { type: 'TypeArgument', position, argumentType: this.parseType(), wildcard: 'extends' };
        }
        if (this.tryAccept('super')) {
          return { type: 'TypeArgument', position, argumentType: this.parseType(), wildcard: 'super' };
        }
        return { type: 'TypeArgument', position, argumentType: null, wildcard: '?' };
      }

      const argumentType = this.parseType();
      if (argumentType.type === 'BasicType' && argumentType.dimensions === 0) {
        throw this.illegal('Expected array type for primitive type argument');
      }
      return { type: 'TypeArgument', position, argumentType, wildcard: null };
    });
  }

  /** `<>` yields an empty list. */
  private parseTypeArgumentsOrDiamond(): TypeArgument[] {
    return this.production('parseTypeArgumentsOrDiamond', () => {
      if (this.tryAccept('<', '>')) return [];
      return this.parseTypeArguments();
    });
  }

  /** `<A, B[]>` as in explicit generic invocations. */
  private parseNonWildcardTypeArguments(): TypeArgument[] {
    return this.production('parseNonWildcardTypeArguments', () => {
      this.accept('<');
      const args: TypeArgument[] = [];
      do {
        const position = this.here();
        args.push({ type: 'TypeArgument', position, argumentType: this.parseType(), wildcard: null });
      } while (this.tryAccept(','));
      this.accept('>');
      return args;
    });
  }

  private parseTypeParameters(): TypeParameter[] {
    return this.production('parseTypeParameters', () => {
      this.accept('<');
      const parameters = [this.parseTypeParameter()];
      while (this.tryAccept(',')) parameters.push(this.parseTypeParameter());
      this.accept('>');
      return parameters;
    });
  }

  private parseTypeParameter(): TypeParameter {
    return this.production('parseTypeParameter', () => {
      const position = this.here();
      const annotations = this.parseAnnotations();
      const name = this.parseIdentifier();
      const bounds: ReferenceType[] = [];
      if (this.tryAccept('extends')) {
        do {
          bounds.push(this.parseReferenceType());
        } while (this.tryAccept('&'));
      }
      return { type: 'TypeParameter', position, name, annotations, extends: bounds };
    });
  }

  /** Number of `[]` pairs. */
  private parseArrayDimension(): number {
    let dimensions = 0;
    while (this.tryAccept('[', ']')) dimensions++;
    return dimensions;
  }

  ////////////////////////////
  // Blocks & statements    //
  ////////////////////////////

  private parseBlock(): Statement[] {
    return this.production('parseBlock', () =>
      this.withArrowLambda(true, () => {
        this.accept('{');
        const statements: Statement[] = [];
        while (!this.wouldAccept('}') && !isEndOfInput(this.peek())) {
          statements.push(this.parseBlockStatement());
        }
        this.accept('}');
        return statements;
      }),
    );
  }

  private parseBlockStatement(): Statement {
    return this.production('parseBlockStatement', () => {
      if (this.wouldAccept(kind('identifier'), ':') || this.wouldAccept('synchronized')) {
        return this.parseStatement();
      }
      if (this.isYieldStatementAhead()) {
        return this.parseStatement();
      }

      const scan = this.scanModifiers(0);
      if (scan.sawNonFinalModifier || this.startsTypeDeclarationAt(scan.index)) {
        return this.parseClassOrInterfaceDeclaration();
      }

      const token = this.peek(scan.index);
      if (scan.sawAnnotation || token.kind === 'basic-type') {
        return this.parseLocalVariableDeclarationStatement();
      }

      if (token.kind !== 'identifier') {
        return this.parseStatement();
      }

      const declaration = this.attempt(() => this.parseLocalVariableDeclarationStatement());
      return declaration ?? this.parseStatement();
    });
  }

  private isYieldStatementAhead(): boolean {
    if (!this.yieldAllowed || !this.isWord(0, 'yield')) return false;
    const next = this.peek(1);
    if (next.kind === 'operator' && ASSIGNMENT_OPERATORS.has(next.text)) return false;
    return next.text !== '.' && next.text !== '[';
  }

  private parseLocalVariableDeclarationStatement(): LocalVariableDeclaration {
    return this.production('parseLocalVariableDeclarationStatement', () => {
      const position = this.here();
      const { modifiers, annotations } = this.parseVariableModifiers();
      const variableType = this.parseType();
      const declarators = this.parseVariableDeclarators();
      this.accept(';');

      return {
        type: 'LocalVariableDeclaration',
        position,
        label: null,
        modifiers,
        annotations,
        variableType,
        declarators,
      };
    });
  }

  private parseStatement(): LabelableStatement {
    return this.production('parseStatement', () => {
      const position = this.here();
      const token = this.peek();

      if (this.wouldAccept('{')) {
        return { type: 'BlockStatement', position, label: null, statements: this.parseBlock() };
      }

      if (this.tryAccept(';')) {
        return { type: 'EmptyStatement', position, label: null };
      }

      if (this.wouldAccept(kind('identifier'), ':')) {
        const label = this.parseIdentifier();
        this.accept(':');
        const statement = this.parseStatement();
        return { ...statement, label };
      }

      if (this.isYieldStatementAhead()) {
        this.advance();
        const expression = this.parseExpression();
        this.accept(';');
        return { type: 'YieldStatement', position, label: null, expression };
      }

      if (token.kind !== 'keyword' && token.kind !== 'modifier') {
        return this.parseExpressionStatement();
      }

      switch (token.text) {
        case 'if': {
          this.advance();
          const condition = this.parseParExpression();
          const thenStatement = this.parseStatement();
          const elseStatement = this.tryAccept('else') ? this.parseStatement() : null;
          return { type: 'IfStatement', position, label: null, condition, thenStatement, elseStatement };
        }

        case 'assert': {
          this.advance();
          const condition = this.parseExpression();
          const message = this.tryAccept(':') ? this.parseExpression() : null;
          this.accept(';');
          return { type: 'AssertStatement', position, label: null, condition, message };
        }

        case 'switch': {
          this.advance();
          const expression = this.parseParExpression();
          const body = this.parseSwitchBlock('statement');
          return {
            type: 'SwitchStatement',
            position,
            label: null,
            expression,
            cases: body.rules.length > 0 ? body.rules : body.groups,
          };
        }

        case 'while': {
          this.advance();
          const condition = this.parseParExpression();
          const body = this.parseStatement();
          return { type: 'WhileStatement', position, label: null, condition, body };
        }

        case 'do': {
          this.advance();
          const body = this.parseStatement();
          this.accept('while');
          const condition = this.parseParExpression();
          this.accept(';');
          return { type: 'DoStatement', position, label: null, condition, body };
        }

        case 'for': {
          this.accept('for', '(');
          const control = this.parseForControl();
          this.accept(')');
          const body = this.parseStatement();
          return { type: 'ForStatement', position, label: null, control, body };
        }

        case 'break':
        case 'continue': {
          this.advance();
          const target = this.peek().kind === 'identifier' ? this.parseIdentifier() : null;
          this.accept(';');
          if (token.text === 'break') {
            return { type: 'BreakStatement', position, label: null, target };
          }
          return { type: 'ContinueStatement', position, label: null, target };
        }

        case 'return': {
          this.advance();
          const expression = this.wouldAccept(';') ? null : this.parseExpression();
          this.accept(';');
          return { type: 'ReturnStatement', position, label: null, expression };
        }

        case 'throw':
          return this.parseThrowStatement();

        case 'synchronized': {
          this.advance();
          const lock = this.parseParExpression();
          const block = this.parseBlock();
          return { type: 'SynchronizedStatement', position, label: null, lock, block };
        }

        case 'try':
          return this.parseTryStatement();

        default:
          return this.parseExpressionStatement();
      }
    });
  }

  private parseExpressionStatement(): LabelableStatement {
    return this.production('parseExpressionStatement', () => {
      const position = this.here();
      const expression = this.parseExpression();
      this.accept(';');
      return { type: 'StatementExpression', position, label: null, expression };
    });
  }

  private parseThrowStatement(): ThrowStatement {
    return this.production('parseThrowStatement', () => {
      const position = this.here();
      this.accept('throw');
      const expression = this.parseExpression();
      this.accept(';');
      return { type: 'ThrowStatement', position, label: null, expression };
    });
  }

  private parseParExpression(): Expression {
    return this.production('parseParExpression', () =>
      this.withArrowLambda(true, () => {
        this.accept('(');
        const expression = this.parseExpression();
        this.accept(')');
        return expression;
      }),
    );
  }

  ////////////////////////////
  // for                    //
  ////////////////////////////

  private parseForControl(): ForControl | EnhancedForControl {
    return this.production('parseForControl', () => {
      const position = this.here();
      let init: VariableDeclaration | Expression[] | null = null;

      if (!this.wouldAccept(';')) {
        const head = this.attempt(() => this.parseForVariableHead());

        if (head && this.tryAccept(':')) {
          const iterable = this.parseExpression();
          return {
            type: 'EnhancedForControl',
            position,
            variable: { ...head.declaration, declarators: [head.declarator(null)] },
            iterable,
          };
        }

        if (head) {
          const initializer = this.tryAccept('=') ? this.parseVariableInitializer() : null;
          const declarators = [head.declarator(initializer)];
          while (this.tryAccept(',')) declarators.push(this.parseVariableDeclarator());
          init = { ...head.declaration, declarators };
        } else {
          init = this.parseExpressionList();
        }
      }

      this.accept(';');
      const condition = this.wouldAccept(';') ? null : this.parseExpression();
      this.accept(';');
      const update = this.wouldAccept(')') ? null : this.parseExpressionList();

      return { type: 'ForControl', position, init, condition, update };
    });
  }

  /**
   * `final Type name[]` at the start of a for header; the caller decides
   * between enhanced and classic form.
   */
  private parseForVariableHead() {
    return this.production('parseForVarControl', () => {
      const position = this.here();
      const { modifiers, annotations } = this.parseVariableModifiers();
      const variableType = this.parseType();
      const namePosition = this.here();
      const name = this.parseIdentifier();
      const dimensions = this.parseArrayDimension();

      const declaration: Omit<VariableDeclaration, 'declarators'> = {
        type: 'VariableDeclaration',
        position,
        modifiers,
        annotations,
        variableType,
      };
      const declarator = (initializer: VariableInitializer | null): VariableDeclarator => ({
        type: 'VariableDeclarator',
        position: namePosition,
        name,
        dimensions,
        initializer,
      });
      return { declaration, declarator };
    });
  }

  private parseExpressionList(): Expression[] {
    return this.production('parseForUpdate', () => {
      const expressions = [this.parseExpression()];
      while (this.tryAccept(',')) expressions.push(this.parseExpression());
      return expressions;
    });
  }

  ////////////////////////////
  // try                    //
  ////////////////////////////

  private parseTryStatement(): TryStatement {
    return this.production('parseTryStatement', () => {
      const position = this.here();
      this.accept('try');

      const resources = this.wouldAccept('(') ? this.parseResourceSpecification() : null;
      const block = this.parseBlock();
      const catches = this.wouldAccept('catch') ? this.parseCatches() : null;
      const finallyBlock = this.tryAccept('finally') ? this.parseBlock() : null;

      if (resources === null && catches === null && finallyBlock === null) {
        throw this.illegal('Expected catch/finally block');
      }

      return { type: 'TryStatement', position, label: null, resources, block, catches, finallyBlock };
    });
  }

  private parseResourceSpecification(): TryResource[] {
    return this.production('parseResourceSpecification', () => {
      this.accept('(');
      const resources: TryResource[] = [];
      do {
        if (this.wouldAccept(')')) break;
        resources.push(this.parseResource());
      } while (this.tryAccept(';'));
      this.accept(')');
      return resources;
    });
  }

  private parseResource(): TryResource {
    return this.production('parseResource', () => {
      const position = this.here();

      const declared = this.attempt(() => {
        const { modifiers, annotations } = this.parseVariableModifiers();
        const resourceType = this.parseType();
        const name = this.parseIdentifier();
        this.accept('=');
        return { modifiers, annotations, resourceType, name };
      });

      const value = this.parseExpression();
      if (declared) {
        return { type: 'TryResource', position, ...declared, value };
      }
      return {
        type: 'TryResource',
        position,
        modifiers: [],
        annotations: [],
        resourceType: null,
        name: null,
        value,
      };
    });
  }

  private parseCatches(): CatchClause[] {
    return this.production('parseCatches', () => {
      const catches: CatchClause[] = [];
      while (this.wouldAccept('catch')) {
        const position = this.here();
        this.accept('catch', '(');

        const parameterPosition = this.here();
        const { modifiers, annotations } = this.parseVariableModifiers();
        const types = [this.parseQualifiedIdentifier()];
        while (this.tryAccept('|')) types.push(this.parseQualifiedIdentifier());
        const name = this.parseIdentifier();
        this.accept(')');

        const block = this.parseBlock();
        catches.push({
          type: 'CatchClause',
          position,
          parameter: {
            type: 'CatchClauseParameter',
            position: parameterPosition,
            modifiers,
            annotations,
            types,
            name,
          },
          block,
        });
      }
      return catches;
    });
  }

  ////////////////////////////
  // switch                 //
  ////////////////////////////

  /**
   * `{ ... }` of a switch. Statements accept colon groups or arrow rules
   * (not both); expressions accept arrow rules only.
   */
  private parseSwitchBlock(form: 'statement' | 'expression'): SwitchBody {
    return this.production('parseSwitchBlockStatementGroups', () => {
      this.accept('{');
      const groups: SwitchStatementCase[] = [];
      const rules: SwitchRule[] = [];
      let defaults = 0;

      while (!this.wouldAccept('}') && !isEndOfInput(this.peek())) {
        const head = this.parseSwitchLabelHead();
        defaults += countDefaults(head.labels);

        if (head.arrow) {
          if (groups.length > 0) throw this.illegal('Cannot mix switch rules and statement groups');
          rules.push(this.parseSwitchRule(head));
        } else {
          if (form === 'expression') throw this.illegal("Expected '->'", this.tokens.last() ?? this.peek());
          if (rules.length > 0) throw this.illegal('Cannot mix switch rules and statement groups');
          const group = this.parseSwitchGroup(head);
          defaults += countDefaults(group.labels) - countDefaults(head.labels);
          groups.push(group);
        }

        if (defaults > 1) throw this.illegal('Duplicate default label');
      }

      this.accept('}');
      return { groups, rules };
    });
  }

  /** `case a, b when guard` or `default`, up to and including `:` / `->`. */
  private parseSwitchLabelHead(): SwitchLabelHead {
    return this.production('parseSwitchLabel', () => {
      const position = this.here();
      const labels: SwitchLabel[] = [];

      if (this.wouldAccept('default')) {
        labels.push(this.parseDefaultLabel());
      } else {
        this.accept('case');
        do {
          labels.push(this.parseCaseLabel());
        } while (this.tryAccept(','));
      }

      let guard: Expression | null = null;
      if (this.isWord(0, 'when')) {
        this.advance();
        guard = this.withArrowLambda(false, () => this.parseExpression());
      }

      if (this.tryAccept('->')) return { position, labels, guard, arrow: true };
      this.accept(':');
      return { position, labels, guard, arrow: false };
    });
  }

  private parseDefaultLabel(): DefaultLabel {
    const position = this.here();
    this.accept('default');
    return { type: 'DefaultLabel', position };
  }

  /**
   * One label after `case`: `null`, `default` (after `case null,`), a
   * record pattern, a type pattern, or a constant expression.
   */
  private parseCaseLabel(): SwitchLabel {
    return this.production('parseCaseLabel', () => {
      if (this.peek().kind === 'null' && this.peek(1).kind !== 'identifier') {
        return this.parsePrimary();
      }
      if (this.wouldAccept('default')) {
        return this.parseDefaultLabel();
      }

      const pattern = this.attempt(() => this.parsePattern());
      if (pattern) return pattern;

      return this.withArrowLambda(false, () => this.parseExpressionl());
    });
  }

  private parseSwitchGroup(head: SwitchLabelHead): SwitchStatementCase {
    return this.production('parseSwitchBlockStatementGroup', () => {
      const labels = [...head.labels];
      let guard = head.guard;

      while (this.wouldAccept('case') || this.wouldAccept('default')) {
        const next = this.parseSwitchLabelHead();
        if (next.arrow) throw this.illegal('Cannot mix switch rules and statement groups', this.tokens.last() ?? this.peek());
        labels.push(...next.labels);
        guard = next.guard ?? guard;
      }

      const statements: Statement[] = [];
      while (
        !this.wouldAccept('case') &&
        !this.wouldAccept('default') &&
        !this.wouldAccept('}') &&
        !isEndOfInput(this.peek())
      ) {
        statements.push(this.parseBlockStatement());
      }

      return { type: 'SwitchStatementCase', position: head.position, labels, guard, statements };
    });
  }

  /**
   * Action after `->`: a block (where `yield` is a statement), a `throw`,
   * or an expression followed by `;`.
   */
  private parseSwitchRule(head: SwitchLabelHead): SwitchRule {
    return this.production('parseSwitchRule', () => {
      let action: Expression | BlockStatement | ThrowStatement;

      if (this.wouldAccept('{')) {
        action = this.parseRuleBlock();
      } else if (this.wouldAccept('throw')) {
        action = this.parseThrowStatement();
      } else {
        action = this.withArrowLambda(true, () => this.parseExpression());
        this.accept(';');
      }

      return {
        type: 'SwitchRule',
        position: head.position,
        labels: head.labels,
        guard: head.guard,
        action,
      };
    });
  }

  private parseRuleBlock(): BlockStatement {
    const position = this.here();
    const saved = this.yieldAllowed;
    this.yieldAllowed = true;
    try {
      return { type: 'BlockStatement', position, label: null, statements: this.parseBlock() };
    } finally {
      this.yieldAllowed = saved;
    }
  }

  private parseSwitchExpression(): SwitchExpression {
    return this.production('parseSwitchExpression', () => {
      const position = this.here();
      this.accept('switch');
      const selector = this.parseParExpression();
      const { rules } = this.parseSwitchBlock('expression');
      return { type: 'SwitchExpression', ...decoration(position), selector, rules };
    });
  }

  ////////////////////////////
  // Patterns               //
  ////////////////////////////

  /**
   * `Type name` or `Type(components...)`. Fails unless one of the two
   * follows, so callers can fall back to an expression.
   */
  private parsePattern(): Pattern {
    return this.production('parsePattern', () => {
      const position = this.here();
      const { modifiers, annotations } = this.parseVariableModifiers();
      const patternType = this.parseType();
      const pattern = this.parsePatternRest(position, modifiers, annotations, patternType);
      if (!pattern) throw this.illegal('Expected pattern');
      return pattern;
    });
  }

  /** `null` when the type is not followed by a binding or components. */
  private parsePatternRest(
    position: Position,
    modifiers: readonly string[],
    annotations: readonly Annotation[],
    patternType: Type,
  ): Pattern | null {
    if (this.wouldAccept('(')) {
      if (patternType.type !== 'ReferenceType') {
        throw this.illegal('Expected reference type in record pattern');
      }
      return this.parseRecordPattern(position, patternType);
    }

    const next = this.peek(1).text;
    if (this.peek().kind === 'identifier' && next !== '.' && next !== '(' && next !== '[') {
      const name = this.parseIdentifier();
      const pattern: TypePattern = {
        type: 'TypePattern',
        position,
        modifiers,
        annotations,
        patternType,
        name,
      };
      return pattern;
    }

    return null;
  }

  private parseRecordPattern(position: Position, patternType: ReferenceType): RecordPattern {
    return this.production('parseRecordPatternComponents', () => {
      this.accept('(');
      const components: Pattern[] = [];
      if (!this.wouldAccept(')')) {
        do {
          components.push(this.parsePattern());
        } while (this.tryAccept(','));
      }
      this.accept(')');
      return { type: 'RecordPattern', position, patternType, components };
    });
  }

  /** Right-hand side of `instanceof`: a pattern, or a bare type. */
  private parseInstanceofTarget(): Type | Pattern {
    return this.production('parseInstanceofTarget', () => {
      const position = this.here();
      const { modifiers, annotations } = this.parseVariableModifiers();
      const testType = this.parseType();
      const pattern = this.parsePatternRest(position, modifiers, annotations, testType);
      if (pattern) return pattern;
      if (modifiers.length > 0 || annotations.length > 0) {
        throw this.illegal('Expected pattern variable');
      }
      return testType;
    });
  }

  ////////////////////////////
  // Expressions            //
  ////////////////////////////

  private parseExpression(): Expression {
    return this.production('parseExpression', () => {
      const target = this.parseExpressionl();
      const token = this.peek();
      if (token.kind !== 'operator' || !ASSIGNMENT_OPERATORS.has(token.text)) {
        return target;
      }

      this.advance();
      const value = this.parseExpression();
      return { type: 'Assignment', position: target.position, operator: token.text, target, value };
    });
  }

  /** Conditional, lambda and method-reference level. */
  private parseExpressionl(): Expression {
    return this.production('parseExpressionl', () => {
      const expression = this.parseExpression2();

      if (this.tryAccept('?')) {
        const ifTrue = this.parseExpression();
        this.accept(':');
        const ifFalse = this.parseExpressionl();
        return { type: 'TernaryExpression', position: expression.position, condition: expression, ifTrue, ifFalse };
      }

      if (this.arrowLambdaAllowed && this.wouldAccept('->')) {
        const parameter = this.toInferredParameter(expression);
        const lambda: LambdaExpression = {
          type: 'LambdaExpression',
          position: expression.position,
          parameters: [parameter],
          body: this.parseLambdaBody(),
        };
        return lambda;
      }

      if (this.tryAccept('::')) {
        const typeArguments = this.wouldAccept('<') ? this.parseNonWildcardTypeArguments() : [];
        const member = this.tryAccept('new') ? 'new' : this.parseIdentifier();
        return { type: 'MethodReference', position: expression.position, target: expression, typeArguments, member };
      }

      return expression;
    });
  }

  private toInferredParameter(expression: Expression): InferredFormalParameter {
    if (
      expression.type === 'MemberReference' &&
      expression.qualifier === null &&
      expression.selectors.length === 0 &&
      expression.prefixOperators.length === 0 &&
      expression.postfixOperators.length === 0
    ) {
      return { type: 'InferredFormalParameter', position: expression.position, name: expression.member };
    }
    throw this.illegal('Expected lambda parameter');
  }

  private parseLambdaBody(): Expression | BlockStatement {
    return this.production('parseLambdaMethodBody', () => {
      this.accept('->');
      if (this.wouldAccept('{')) {
        const position = this.here();
        return { type: 'BlockStatement', position, label: null, statements: this.parseBlock() };
      }
      return this.withArrowLambda(true, () => this.parseExpression());
    });
  }

  /** Binary operators and `instanceof`, folded by precedence. */
  private parseExpression2(): Expression {
    return this.production('parseExpression2', () => {
      const head = this.parseExpression3();
      const steps: InfixStep[] = [];

      for (;;) {
        const token = this.peek();

        if (token.kind === 'keyword' && token.text === 'instanceof') {
          this.advance();
          steps.push({ kind: 'instanceof', test: this.parseInstanceofTarget() });
          this.rejectOperatorAfterInstanceof();
          continue;
        }

        if (token.kind !== 'operator' || !INFIX_OPERATORS.has(token.text)) break;

        const operator = this.parseInfixOperator();
        steps.push({ kind: 'operator', operator, operand: this.parseExpression3() });
      }

      return foldBinary(head, steps);
    });
  }

  private rejectOperatorAfterInstanceof(): void {
    const token = this.peek();
    if (token.kind !== 'operator' || !INFIX_OPERATORS.has(token.text)) return;
    if (precedenceOf(this.peekInfixOperator()) > RELATIONAL_LEVEL) {
      throw this.illegal('Unexpected operator after instanceof type', token);
    }
  }

  /** The infix operator ahead, with adjacent `>` tokens combined. */
  private peekInfixOperator(): string {
    let operator = this.peek().text;
    if (operator !== '>') return operator;
    for (let i = 1; i < 3 && this.isAdjacentGreater(i); i++) operator += '>';
    return operator;
  }

  private isAdjacentGreater(offset: number): boolean {
    const previous = this.peek(offset - 1);
    const next = this.peek(offset);
    if (next.text !== '>' || next.position === null || previous.position === null) return false;
    return (
      next.position.line === previous.position.line &&
      next.position.column === previous.position.column + previous.text.length
    );
  }

  private parseInfixOperator(): string {
    const operator = this.peekInfixOperator();
    // `>>` and `>>>` arrive as separate `>` tokens
    const count = operator.startsWith('>>') ? operator.length : 1;
    for (let i = 0; i < count; i++) this.advance();
    return operator;
  }

  /** Prefix operators, casts, lambdas in parentheses, primaries, selectors, postfix operators. */
  private parseExpression3(): Expression {
    return this.production('parseExpression3', () => {
      const position = this.here();

      const prefixOperators: string[] = [];
      for (;;) {
        const token = this.peek();
        if (token.kind !== 'operator' || !PREFIX_OPERATORS.has(token.text)) break;
        prefixOperators.push(this.advance().text);
      }

      if (this.wouldAccept('(')) {
        if (prefixOperators.length === 0 && this.arrowLambdaAllowed) {
          const lambda = this.attempt(() => this.parseLambdaExpression());
          if (lambda) return lambda;
        }
        const cast = this.attempt(() => this.parseCast(position, prefixOperators));
        if (cast) return cast;
      }

      const primary = this.parsePrimary();

      const selectors: Selector[] = [...primary.selectors];
      while (this.wouldAccept('.') || this.wouldAccept('[')) {
        selectors.push(this.parseSelector());
      }

      const postfixOperators: string[] = [];
      for (;;) {
        const token = this.peek();
        if (token.kind !== 'operator' || !POSTFIX_OPERATORS.has(token.text)) break;
        postfixOperators.push(this.advance().text);
      }

      const decorated: Primary = { ...primary, position, prefixOperators, selectors, postfixOperators };
      return decorated;
    });
  }

  private parseCast(position: Position, prefixOperators: readonly string[]): Expression {
    return this.production('parseCast', () => {
      this.accept('(');
      const castType = this.parseType();
      this.accept(')');

      if (castType.type === 'ReferenceType' && NOT_AFTER_REFERENCE_CAST.has(this.peek().text)) {
        throw this.illegal('Not a cast');
      }

      const expression = this.parseExpression3();
      return { type: 'Cast', position, castType, expression, prefixOperators };
    });
  }

  private parseLambdaExpression(): LambdaExpression {
    return this.production('parseLambdaExpression', () => {
      const position = this.here();
      let parameters: (FormalParameter | InferredFormalParameter)[];

      if (
        this.wouldAccept('(', ')') ||
        this.wouldAccept('(', kind('identifier'), ',') ||
        this.wouldAccept('(', kind('identifier'), ')')
      ) {
        this.accept('(');
        parameters = [];
        while (!this.wouldAccept(')')) {
          const parameterPosition = this.here();
          parameters.push({ type: 'InferredFormalParameter', position: parameterPosition, name: this.parseIdentifier() });
          if (!this.tryAccept(',')) break;
        }
        this.accept(')');
      } else {
        parameters = this.parseFormalParameters();
      }

      return { type: 'LambdaExpression', position, parameters, body: this.parseLambdaBody() };
    });
  }

  ////////////////////////////
  // Primaries              //
  ////////////////////////////

  private parsePrimary(): Primary {
    return this.production('parsePrimary', () => {
      const position = this.here();
      const token = this.peek();

      if (isLiteralToken(token)) {
        this.advance();
        return {
          type: 'Literal',
          ...decoration(position),
          kind: token.kind,
          text: token.text,
          value: token.value,
        };
      }

      if (this.wouldAccept('(')) {
        const expression = this.parseParExpression();
        return { type: 'ParenthesizedExpression', ...decoration(position), expression };
      }

      if (this.tryAccept('this')) {
        if (this.wouldAccept('(')) {
          return {
            type: 'ExplicitConstructorInvocation',
            ...decoration(position),
            typeArguments: [],
            arguments: this.parseArguments(),
          };
        }
        return { type: 'This', ...decoration(position) };
      }

      if (this.wouldAccept('super', '::')) {
        this.advance();
        return { type: 'Super', ...decoration(position) };
      }

      if (this.tryAccept('super')) {
        return this.parseSuperSuffix(position, null, []);
      }

      if (this.tryAccept('new')) {
        return this.parseCreator(position);
      }

      if (this.wouldAccept('<')) {
        const typeArguments = this.parseNonWildcardTypeArguments();
        if (this.tryAccept('this')) {
          return {
            type: 'ExplicitConstructorInvocation',
            ...decoration(position),
            typeArguments,
            arguments: this.parseArguments(),
          };
        }
        return this.parseExplicitGenericInvocationSuffix(position, null, typeArguments);
      }

      if (token.kind === 'identifier') {
        const names = [this.parseIdentifier()];
        while (this.wouldAccept('.', kind('identifier'))) {
          this.advance();
          names.push(this.parseIdentifier());
        }
        return this.parseIdentifierSuffix(position, names);
      }

      if (token.kind === 'basic-type') {
        this.advance();
        const basic: BasicType = {
          type: 'BasicType',
          position,
          name: token.text,
          dimensions: this.parseArrayDimension(),
        };
        if (basic.dimensions > 0 && this.wouldAccept('::')) {
          return { type: 'TypeReference', ...decoration(position), referencedType: basic };
        }
        this.accept('.', 'class');
        return { type: 'ClassReference', ...decoration(position), classType: basic };
      }

      if (this.tryAccept('void')) {
        this.accept('.', 'class');
        return { type: 'VoidClassReference', ...decoration(position) };
      }

      if (this.wouldAccept('switch')) {
        return this.parseSwitchExpression();
      }

      throw this.illegal('Expected expression');
    });
  }

  /**
   * What follows a dotted name in a primary. For invocations and plain
   * references the last name is the member and the rest the qualifier.
   */
  private parseIdentifierSuffix(position: Position, names: readonly string[]): Primary {
    return this.production('parseIdentifierSuffix', () => {
      const member = names[names.length - 1];
      const qualifier = names.length > 1 ? names.slice(0, -1).join('.') : null;
      const fullName = names.join('.');

      if (this.wouldAccept('[', ']')) {
        const arrayType = buildReferenceChain(segmentsOf(position, names), this.parseArrayDimension());
        if (this.wouldAccept('::')) {
          return { type: 'TypeReference', ...decoration(position), referencedType: arrayType };
        }
        this.accept('.', 'class');
        return { type: 'ClassReference', ...decoration(position), classType: arrayType };
      }

      if (this.wouldAccept('(')) {
        return {
          type: 'MethodInvocation',
          ...decoration(position),
          qualifier,
          typeArguments: [],
          member,
          arguments: this.parseArguments(),
        };
      }

      if (this.tryAccept('.', 'class')) {
        return {
          type: 'ClassReference',
          ...decoration(position),
          classType: buildReferenceChain(segmentsOf(position, names), 0),
        };
      }

      if (this.tryAccept('.', 'this')) {
        return { type: 'This', ...decoration(position), qualifier: fullName };
      }

      if (this.wouldAccept('.', '<')) {
        this.advance();
        const typeArguments = this.parseNonWildcardTypeArguments();
        return this.parseExplicitGenericInvocationSuffix(position, fullName, typeArguments);
      }

      if (this.tryAccept('.', 'new')) {
        const typeArguments = this.wouldAccept('<') ? this.parseNonWildcardTypeArguments() : [];
        return this.parseInnerCreator(position, fullName, typeArguments);
      }

      if (this.wouldAccept('.', 'super', '::')) {
        this.accept('.', 'super');
        return { type: 'Super', ...decoration(position), qualifier: fullName };
      }

      if (this.tryAccept('.', 'super')) {
        return this.parseSuperSuffix(position, fullName, []);
      }

      return { type: 'MemberReference', ...decoration(position), qualifier, member };
    });
  }

  /** After `super`: `.member`, `.member(args)`, `.<T>member(args)` or `(args)`. */
  private parseSuperSuffix(
    position: Position,
    qualifier: string | null,
    constructorTypeArguments: readonly TypeArgument[],
  ): Primary {
    return this.production('parseSuperSuffix', () => {
      if (!this.tryAccept('.')) {
        return {
          type: 'SuperConstructorInvocation',
          ...decoration(position),
          qualifier,
          typeArguments: constructorTypeArguments,
          arguments: this.parseArguments(),
        };
      }

      const typeArguments = this.wouldAccept('<') ? this.parseNonWildcardTypeArguments() : [];
      const member = this.parseIdentifier();

      if (this.wouldAccept('(')) {
        return {
          type: 'SuperMethodInvocation',
          ...decoration(position),
          qualifier,
          typeArguments,
          member,
          arguments: this.parseArguments(),
        };
      }
      return { type: 'SuperMemberReference', ...decoration(position), qualifier, member };
    });
  }

  /** After `<T>`: `super...` or `name(args)`. */
  private parseExplicitGenericInvocationSuffix(
    position: Position,
    qualifier: string | null,
    typeArguments: readonly TypeArgument[],
  ): Primary {
    return this.production('parseExplicitGenericInvocationSuffix', () => {
      if (this.tryAccept('super')) {
        return this.parseSuperSuffix(position, qualifier, typeArguments);
      }
      const member = this.parseIdentifier();
      return {
        type: 'MethodInvocation',
        ...decoration(position),
        qualifier,
        typeArguments,
        member,
        arguments: this.parseArguments(),
      };
    });
  }

  private parseArguments(): Expression[] {
    return this.production('parseArguments', () =>
      this.withArrowLambda(true, () => {
        this.accept('(');
        const args: Expression[] = [];
        if (this.tryAccept(')')) return args;
        do {
          args.push(this.parseExpression());
        } while (this.tryAccept(','));
        this.accept(')');
        return args;
      }),
    );
  }

  private parseSelector(): Selector {
    return this.production('parseSelector', () => {
      const position = this.here();

      if (this.tryAccept('[')) {
        const index = this.withArrowLambda(true, () => this.parseExpression());
        this.accept(']');
        return { type: 'ArraySelector', ...decoration(position), index };
      }

      this.accept('.');
      const token = this.peek();

      if (token.kind === 'identifier') {
        const member = this.parseIdentifier();
        if (this.wouldAccept('(')) {
          return {
            type: 'MethodInvocation',
            ...decoration(position),
            typeArguments: [],
            member,
            arguments: this.parseArguments(),
          };
        }
        return { type: 'MemberReference', ...decoration(position), member };
      }

      if (this.wouldAccept('<')) {
        const typeArguments = this.parseNonWildcardTypeArguments();
        const invocation = this.parseExplicitGenericInvocationSuffix(position, null, typeArguments);
        if (
          invocation.type === 'MethodInvocation' ||
          invocation.type === 'SuperMethodInvocation' ||
          invocation.type === 'SuperMemberReference' ||
          invocation.type === 'SuperConstructorInvocation'
        ) {
          return invocation;
        }
        throw this.illegal('Expected selector');
      }

      if (this.tryAccept('this')) {
        return { type: 'This', ...decoration(position) };
      }

      if (this.wouldAccept('super', '::')) {
        this.advance();
        return { type: 'Super', ...decoration(position) };
      }

      if (this.tryAccept('super')) {
        const suffix = this.parseSuperSuffix(position, null, []);
        if (
          suffix.type === 'SuperMethodInvocation' ||
          suffix.type === 'SuperMemberReference' ||
          suffix.type === 'SuperConstructorInvocation'
        ) {
          return suffix;
        }
        throw this.illegal('Expected selector');
      }

      if (this.tryAccept('new')) {
        const typeArguments = this.wouldAccept('<') ? this.parseNonWildcardTypeArguments() : [];
        return this.parseInnerCreator(position, null, typeArguments);
      }

      throw this.illegal('Expected selector');
    });
  }

  ////////////////////////////
  // Creators               //
  ////////////////////////////

  private parseCreator(position: Position): ClassCreator | ArrayCreator {
    return this.production('parseCreator', () => {
      const token = this.peek();
      if (token.kind === 'basic-type') {
        this.advance();
        const basic: BasicType = { type: 'BasicType', position: this.positionOf(token), name: token.text, dimensions: 0 };
        return this.parseArrayCreatorRest(position, basic);
      }

      const constructorTypeArguments = this.wouldAccept('<') ? this.parseNonWildcardTypeArguments() : [];
      const segments = this.parseTypeSegments(true);
      const createdType = buildReferenceChain(segments, 0);

      if (this.wouldAccept('[')) {
        if (constructorTypeArguments.length > 0) {
          throw this.illegal('Array creator not allowed with generic constructor type arguments');
        }
        return this.parseArrayCreatorRest(position, createdType);
      }

      const args = this.parseArguments();
      const owner = segments[segments.length - 1].name;
      const body = this.wouldAccept('{') ? this.parseClassBody(owner, 'class') : null;

      return {
        type: 'ClassCreator',
        ...decoration(position),
        constructorTypeArguments,
        createdType,
        arguments: args,
        body,
      };
    });
  }

  private parseArrayCreatorRest(position: Position, createdType: Type): ArrayCreator {
    return this.production('parseArrayCreatorRest', () => {
      if (this.wouldAccept('[', ']')) {
        const count = this.parseArrayDimension();
        const initializer = this.parseArrayInitializer();
        return {
          type: 'ArrayCreator',
          ...decoration(position),
          createdType,
          dimensions: new Array<null>(count).fill(null),
          initializer,
        };
      }

      const dimensions: (Expression | null)[] = [];
      while (this.wouldAccept('[') && !this.wouldAccept('[', ']')) {
        this.accept('[');
        dimensions.push(this.withArrowLambda(true, () => this.parseExpression()));
        this.accept(']');
      }
      if (dimensions.length === 0) throw this.illegal("Expected '['");
      for (let extra = this.parseArrayDimension(); extra > 0; extra--) dimensions.push(null);

      return { type: 'ArrayCreator', ...decoration(position), createdType, dimensions, initializer: null };
    });
  }

  private parseInnerCreator(
    position: Position,
    qualifier: string | null,
    constructorTypeArguments: readonly TypeArgument[],
  ): InnerClassCreator {
    return this.production('parseInnerCreator', () => {
      const typePosition = this.here();
      const name = this.parseIdentifier();
      const args = this.wouldAccept('<') ? this.parseTypeArgumentsOrDiamond() : null;
      const createdType: ReferenceType = {
        type: 'ReferenceType',
        position: typePosition,
        name,
        arguments: args,
        dimensions: 0,
        subType: null,
      };
      const callArguments = this.parseArguments();
      const body = this.wouldAccept('{') ? this.parseClassBody(name, 'class') : null;

      return {
        type: 'InnerClassCreator',
        ...decoration(position),
        qualifier,
        constructorTypeArguments,
        createdType,
        arguments: callArguments,
        body,
      };
    });
  }

  private positionOf(token: Lexeme): Position {
    if (token.position === null) throw this.illegal('Unexpected end of input', token);
    return token.position;
  }
}

////////////////////////////
// Node helpers           //
////////////////////////////

function toExpected(e: Expectation): ExpectedToken {
  return typeof e === 'string' ? tok(e) : e;
}

/** Fold `A<B>.C` segments into a right-recursive chain; dimensions go on the head. */
function buildReferenceChain(segments: readonly TypeSegment[], dimensions: number): ReferenceType {
  let subType: ReferenceType | null = null;
  for (let i = segments.length - 1; i >= 0; i--) {
    const segment = segments[i];
    subType = {
      type: 'ReferenceType',
      position: segment.position,
      name: segment.name,
      arguments: segment.arguments,
      dimensions: i === 0 ? dimensions : 0,
      subType,
    };
  }
  if (subType === null) {
    throw createInternalError({ message: 'Reference type without segments' });
  }
  return subType;
}

function segmentsOf(position: Position, names: readonly string[]): TypeSegment[] {
  return names.map((name) => ({ position, name, arguments: null }));
}

function withDimensions(type: Type, extra: number): Type {
  if (extra === 0) return type;
  return { ...type, dimensions: type.dimensions + extra };
}

function countDefaults(labels: readonly SwitchLabel[]): number {
  return labels.filter((label) => label.type === 'DefaultLabel').length;
}
