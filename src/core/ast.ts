/**
 * java-frontend – Syntax tree types
 *
 * The parser's output: a tree of immutable nodes discriminated by `type`.
 *
 * Conventions:
 *  - every node carries the `position` of its first token;
 *  - declarations carry `modifiers` (in source order, no duplicates),
 *    `annotations` and `documentation` (the raw doc comment or `null`);
 *  - statements carry `label` (`null` unless labelled);
 *  - primary expressions carry `qualifier`, `selectors`,
 *    `prefixOperators` and `postfixOperators`;
 *  - a qualified type `A.B<C>.D` is a right-recursive `subType` chain;
 *  - array dimensions are counts.
 *
 * License: Apache-2.0
 */

import type { LiteralKind, Position } from './tokens';

export type { Position } from './tokens';

/////////////////////////
// Base node & helpers //
/////////////////////////

export interface BaseNode {
  readonly type: string;
  readonly position: Position;
}

export interface Documented {
  readonly modifiers: readonly string[];
  readonly annotations: readonly Annotation[];
  readonly documentation: string | null;
}

export interface BaseStatement extends BaseNode {
  readonly label: string | null;
}

export interface BasePrimary extends BaseNode {
  /** Dotted prefix such as `a.b` in `a.b.c()`, or `null`. */
  readonly qualifier: string | null;
  readonly selectors: readonly Selector[];
  readonly prefixOperators: readonly string[];
  readonly postfixOperators: readonly string[];
}

//////////////////////
// Compilation unit //
//////////////////////

export interface CompilationUnit extends BaseNode {
  readonly type: 'CompilationUnit';
  readonly package: PackageDeclaration | null;
  readonly imports: readonly Import[];
  readonly types: readonly TypeDeclaration[];
  /** Methods declared outside any type. */
  readonly methods: readonly MethodDeclaration[];
}

export interface PackageDeclaration extends BaseNode {
  readonly type: 'PackageDeclaration';
  readonly name: string;
  readonly annotations: readonly Annotation[];
  readonly documentation: string | null;
}

export interface Import extends BaseNode {
  readonly type: 'Import';
  readonly path: string;
  readonly static: boolean;
  readonly wildcard: boolean;
}

//////////////////////
// Declarations     //
//////////////////////

export type TypeDeclaration =
  | ClassDeclaration
  | InterfaceDeclaration
  | EnumDeclaration
  | AnnotationDeclaration
  | RecordDeclaration;

export interface ClassDeclaration extends BaseNode, Documented {
  readonly type: 'ClassDeclaration';
  readonly name: string;
  readonly typeParameters: readonly TypeParameter[];
  readonly extends: ReferenceType | null;
  readonly implements: readonly ReferenceType[];
  readonly permits: readonly ReferenceType[];
  readonly body: readonly MemberDeclaration[];
}

export interface InterfaceDeclaration extends BaseNode, Documented {
  readonly type: 'InterfaceDeclaration';
  readonly name: string;
  readonly typeParameters: readonly TypeParameter[];
  readonly extends: readonly ReferenceType[];
  readonly permits: readonly ReferenceType[];
  readonly body: readonly MemberDeclaration[];
}

export interface EnumDeclaration extends BaseNode, Documented {
  readonly type: 'EnumDeclaration';
  readonly name: string;
  readonly implements: readonly ReferenceType[];
  readonly constants: readonly EnumConstantDeclaration[];
  readonly body: readonly MemberDeclaration[];
}

export interface EnumConstantDeclaration extends BaseNode {
  readonly type: 'EnumConstantDeclaration';
  readonly name: string;
  readonly annotations: readonly Annotation[];
  readonly documentation: string | null;
  readonly arguments: readonly Expression[] | null;
  readonly body: readonly MemberDeclaration[] | null;
}

export interface AnnotationDeclaration extends BaseNode, Documented {
  readonly type: 'AnnotationDeclaration';
  readonly name: string;
  readonly body: readonly MemberDeclaration[];
}

export interface RecordDeclaration extends BaseNode, Documented {
  readonly type: 'RecordDeclaration';
  readonly name: string;
  readonly typeParameters: readonly TypeParameter[];
  readonly components: readonly FormalParameter[];
  readonly implements: readonly ReferenceType[];
  readonly body: readonly MemberDeclaration[];
}

export type MemberDeclaration =
  | TypeDeclaration
  | FieldDeclaration
  | ConstantDeclaration
  | MethodDeclaration
  | ConstructorDeclaration
  | AnnotationMethod
  | InitializerBlock;

export interface FieldDeclaration extends BaseNode, Documented {
  readonly type: 'FieldDeclaration';
  readonly fieldType: Type;
  readonly declarators: readonly VariableDeclarator[];
}

/** Interface or annotation-type field; always initialized. */
export interface ConstantDeclaration extends BaseNode, Documented {
  readonly type: 'ConstantDeclaration';
  readonly fieldType: Type;
  readonly declarators: readonly VariableDeclarator[];
}

export interface MethodDeclaration extends BaseNode, Documented {
  readonly type: 'MethodDeclaration';
  readonly name: string;
  readonly typeParameters: readonly TypeParameter[];
  /** `null` for `void`. */
  readonly returnType: Type | null;
  readonly parameters: readonly FormalParameter[];
  readonly throws: readonly string[];
  /** `null` for abstract and native methods. */
  readonly body: readonly Statement[] | null;
}

export interface ConstructorDeclaration extends BaseNode, Documented {
  readonly type: 'ConstructorDeclaration';
  readonly name: string;
  readonly typeParameters: readonly TypeParameter[];
  readonly parameters: readonly FormalParameter[];
  readonly throws: readonly string[];
  readonly body: readonly Statement[];
  /** Record canonical constructor written without a parameter list. */
  readonly compact: boolean;
}

export interface AnnotationMethod extends BaseNode, Documented {
  readonly type: 'AnnotationMethod';
  readonly name: string;
  readonly returnType: Type;
  readonly dimensions: number;
  readonly default: ElementValue | null;
}

export interface InitializerBlock extends BaseNode {
  readonly type: 'InitializerBlock';
  readonly static: boolean;
  readonly body: readonly Statement[];
}

export interface TypeParameter extends BaseNode {
  readonly type: 'TypeParameter';
  readonly name: string;
  readonly annotations: readonly Annotation[];
  readonly extends: readonly ReferenceType[];
}

//////////////////////
// Annotations      //
//////////////////////

export interface Annotation extends BaseNode {
  readonly type: 'Annotation';
  readonly name: string;
  /** A single value, named pairs, or `null` for a marker annotation. */
  readonly element: ElementValue | readonly ElementValuePair[] | null;
}

export interface ElementValuePair extends BaseNode {
  readonly type: 'ElementValuePair';
  readonly name: string;
  readonly value: ElementValue;
}

export interface ElementArrayValue extends BaseNode {
  readonly type: 'ElementArrayValue';
  readonly values: readonly ElementValue[];
}

export type ElementValue = Annotation | ElementArrayValue | Expression;

//////////////////////
// Variables        //
//////////////////////

export interface FormalParameter extends BaseNode {
  readonly type: 'FormalParameter';
  readonly modifiers: readonly string[];
  readonly annotations: readonly Annotation[];
  readonly parameterType: Type;
  readonly name: string;
  readonly varargs: boolean;
}

/** Lambda parameter without a declared type. */
export interface InferredFormalParameter extends BaseNode {
  readonly type: 'InferredFormalParameter';
  readonly name: string;
}

export interface VariableDeclarator extends BaseNode {
  readonly type: 'VariableDeclarator';
  readonly name: string;
  /** Dimensions written after the name: `int x[]`. */
  readonly dimensions: number;
  readonly initializer: VariableInitializer | null;
}

export type VariableInitializer = Expression | ArrayInitializer;

export interface ArrayInitializer extends BaseNode {
  readonly type: 'ArrayInitializer';
  readonly initializers: readonly VariableInitializer[];
}

export interface LocalVariableDeclaration extends BaseStatement {
  readonly type: 'LocalVariableDeclaration';
  readonly modifiers: readonly string[];
  readonly annotations: readonly Annotation[];
  readonly variableType: Type;
  readonly declarators: readonly VariableDeclarator[];
}

/** Declaration in a `for` header. */
export interface VariableDeclaration extends BaseNode {
  readonly type: 'VariableDeclaration';
  readonly modifiers: readonly string[];
  readonly annotations: readonly Annotation[];
  readonly variableType: Type;
  readonly declarators: readonly VariableDeclarator[];
}

//////////////////////
// Types            //
//////////////////////

export type Type = BasicType | ReferenceType;

export interface BasicType extends BaseNode {
  readonly type: 'BasicType';
  readonly name: string;
  readonly dimensions: number;
}

export interface ReferenceType extends BaseNode {
  readonly type: 'ReferenceType';
  readonly name: string;
  /** `null` without `<...>`, `[]` for the diamond. */
  readonly arguments: readonly TypeArgument[] | null;
  readonly dimensions: number;
  readonly subType: ReferenceType | null;
}

export interface TypeArgument extends BaseNode {
  readonly type: 'TypeArgument';
  /** `null` for a bare `?`. */
  readonly argumentType: Type | null;
  /** `'?'`, `'extends'`, `'super'`, or `null` for a plain type. */
  readonly wildcard: '?' | 'extends' | 'super' | null;
}

//////////////////////
// Statements       //
//////////////////////

export type Statement =
  | BlockStatement
  | EmptyStatement
  | LocalVariableDeclaration
  | TypeDeclaration
  | IfStatement
  | AssertStatement
  | SwitchStatement
  | WhileStatement
  | DoStatement
  | ForStatement
  | BreakStatement
  | ContinueStatement
  | ReturnStatement
  | ThrowStatement
  | SynchronizedStatement
  | TryStatement
  | YieldStatement
  | StatementExpression;

export interface BlockStatement extends BaseStatement {
  readonly type: 'BlockStatement';
  readonly statements: readonly Statement[];
}

export interface EmptyStatement extends BaseStatement {
  readonly type: 'EmptyStatement';
}

export interface IfStatement extends BaseStatement {
  readonly type: 'IfStatement';
  readonly condition: Expression;
  readonly thenStatement: Statement;
  readonly elseStatement: Statement | null;
}

export interface AssertStatement extends BaseStatement {
  readonly type: 'AssertStatement';
  readonly condition: Expression;
  readonly message: Expression | null;
}

export interface SwitchStatement extends BaseStatement {
  readonly type: 'SwitchStatement';
  readonly expression: Expression;
  readonly cases: readonly SwitchStatementCase[] | readonly SwitchRule[];
}

/** `case A, B:` / `default:` group with the statements that follow. */
export interface SwitchStatementCase extends BaseNode {
  readonly type: 'SwitchStatementCase';
  readonly labels: readonly SwitchLabel[];
  readonly guard: Expression | null;
  readonly statements: readonly Statement[];
}

/** `case A, B -> action` */
export interface SwitchRule extends BaseNode {
  readonly type: 'SwitchRule';
  readonly labels: readonly SwitchLabel[];
  readonly guard: Expression | null;
  readonly action: Expression | BlockStatement | ThrowStatement;
}

export interface DefaultLabel extends BaseNode {
  readonly type: 'DefaultLabel';
}

export type SwitchLabel = Expression | Pattern | DefaultLabel;

export interface WhileStatement extends BaseStatement {
  readonly type: 'WhileStatement';
  readonly condition: Expression;
  readonly body: Statement;
}

export interface DoStatement extends BaseStatement {
  readonly type: 'DoStatement';
  readonly condition: Expression;
  readonly body: Statement;
}

export interface ForStatement extends BaseStatement {
  readonly type: 'ForStatement';
  readonly control: ForControl | EnhancedForControl;
  readonly body: Statement;
}

export interface ForControl extends BaseNode {
  readonly type: 'ForControl';
  readonly init: VariableDeclaration | readonly Expression[] | null;
  readonly condition: Expression | null;
  readonly update: readonly Expression[] | null;
}

export interface EnhancedForControl extends BaseNode {
  readonly type: 'EnhancedForControl';
  readonly variable: VariableDeclaration;
  readonly iterable: Expression;
}

export interface BreakStatement extends BaseStatement {
  readonly type: 'BreakStatement';
  readonly target: string | null;
}

export interface ContinueStatement extends BaseStatement {
  readonly type: 'ContinueStatement';
  readonly target: string | null;
}

export interface ReturnStatement extends BaseStatement {
  readonly type: 'ReturnStatement';
  readonly expression: Expression | null;
}

export interface ThrowStatement extends BaseStatement {
  readonly type: 'ThrowStatement';
  readonly expression: Expression;
}

export interface SynchronizedStatement extends BaseStatement {
  readonly type: 'SynchronizedStatement';
  readonly lock: Expression;
  readonly block: readonly Statement[];
}

export interface TryStatement extends BaseStatement {
  readonly type: 'TryStatement';
  readonly resources: readonly TryResource[] | null;
  readonly block: readonly Statement[];
  readonly catches: readonly CatchClause[] | null;
  readonly finallyBlock: readonly Statement[] | null;
}

/**
 * `Type name = value` or, for an existing variable, only `value`
 * (`resourceType` and `name` are then `null`).
 */
export interface TryResource extends BaseNode {
  readonly type: 'TryResource';
  readonly modifiers: readonly string[];
  readonly annotations: readonly Annotation[];
  readonly resourceType: Type | null;
  readonly name: string | null;
  readonly value: Expression;
}

export interface CatchClause extends BaseNode {
  readonly type: 'CatchClause';
  readonly parameter: CatchClauseParameter;
  readonly block: readonly Statement[];
}

export interface CatchClauseParameter extends BaseNode {
  readonly type: 'CatchClauseParameter';
  readonly modifiers: readonly string[];
  readonly annotations: readonly Annotation[];
  /** Alternatives of a multi-catch, as qualified names. */
  readonly types: readonly string[];
  readonly name: string;
}

export interface YieldStatement extends BaseStatement {
  readonly type: 'YieldStatement';
  readonly expression: Expression;
}

export interface StatementExpression extends BaseStatement {
  readonly type: 'StatementExpression';
  readonly expression: Expression;
}

//////////////////////
// Patterns         //
//////////////////////

export type Pattern = TypePattern | RecordPattern;

/** `String s`, `final var x` */
export interface TypePattern extends BaseNode {
  readonly type: 'TypePattern';
  readonly modifiers: readonly string[];
  readonly annotations: readonly Annotation[];
  readonly patternType: Type;
  readonly name: string;
}

/** `Point(int x, var y)` */
export interface RecordPattern extends BaseNode {
  readonly type: 'RecordPattern';
  readonly patternType: ReferenceType;
  readonly components: readonly Pattern[];
}

//////////////////////
// Expressions      //
//////////////////////

export type Expression =
  | Assignment
  | TernaryExpression
  | BinaryOperation
  | InstanceOfExpression
  | InstanceOfPatternExpression
  | LambdaExpression
  | MethodReference
  | Cast
  | Primary;

export interface Assignment extends BaseNode {
  readonly type: 'Assignment';
  readonly operator: string;
  readonly target: Expression;
  readonly value: VariableInitializer;
}

export interface TernaryExpression extends BaseNode {
  readonly type: 'TernaryExpression';
  readonly condition: Expression;
  readonly ifTrue: Expression;
  readonly ifFalse: Expression;
}

export interface BinaryOperation extends BaseNode {
  readonly type: 'BinaryOperation';
  readonly operator: string;
  readonly left: Expression;
  readonly right: Expression;
}

/** `x instanceof T` without a binding. */
export interface InstanceOfExpression extends BaseNode {
  readonly type: 'InstanceOfExpression';
  readonly expression: Expression;
  readonly testType: Type;
}

/** `x instanceof T t` and `x instanceof R(...)`. */
export interface InstanceOfPatternExpression extends BaseNode {
  readonly type: 'InstanceOfPatternExpression';
  readonly expression: Expression;
  readonly pattern: Pattern;
}

export interface LambdaExpression extends BaseNode {
  readonly type: 'LambdaExpression';
  readonly parameters: readonly (FormalParameter | InferredFormalParameter)[];
  readonly body: Expression | BlockStatement;
}

/** `target::member`, where `member` may be `new`. */
export interface MethodReference extends BaseNode {
  readonly type: 'MethodReference';
  readonly target: Expression;
  readonly typeArguments: readonly TypeArgument[];
  readonly member: string;
}

export interface Cast extends BaseNode {
  readonly type: 'Cast';
  readonly castType: Type;
  readonly expression: Expression;
  readonly prefixOperators: readonly string[];
}

//////////////////////
// Primaries        //
//////////////////////

export type Primary =
  | Literal
  | ParenthesizedExpression
  | MemberReference
  | MethodInvocation
  | This
  | Super
  | ExplicitConstructorInvocation
  | SuperConstructorInvocation
  | SuperMethodInvocation
  | SuperMemberReference
  | ClassReference
  | VoidClassReference
  | TypeReference
  | ClassCreator
  | ArrayCreator
  | InnerClassCreator
  | SwitchExpression;

export type Selector =
  | ArraySelector
  | MemberReference
  | MethodInvocation
  | This
  | Super
  | SuperMethodInvocation
  | SuperMemberReference
  | SuperConstructorInvocation
  | InnerClassCreator;

export interface Literal extends BasePrimary {
  readonly type: 'Literal';
  readonly kind: LiteralKind;
  /** Raw lexeme, quotes included. */
  readonly text: string;
  /** Decoded value for string and character literals, else the lexeme. */
  readonly value: string;
}

export interface ParenthesizedExpression extends BasePrimary {
  readonly type: 'ParenthesizedExpression';
  readonly expression: Expression;
}

/** A name: `x`, `a.b.x` (qualifier `a.b`), or `.x` as a selector. */
export interface MemberReference extends BasePrimary {
  readonly type: 'MemberReference';
  readonly member: string;
}

export interface MethodInvocation extends BasePrimary {
  readonly type: 'MethodInvocation';
  readonly typeArguments: readonly TypeArgument[];
  readonly member: string;
  readonly arguments: readonly Expression[];
}

export interface This extends BasePrimary {
  readonly type: 'This';
}

/** `super` as a method-reference target: `super::m`, `A.super::m`. */
export interface Super extends BasePrimary {
  readonly type: 'Super';
}

/** `this(...)` or `<T>this(...)`. */
export interface ExplicitConstructorInvocation extends BasePrimary {
  readonly type: 'ExplicitConstructorInvocation';
  readonly typeArguments: readonly TypeArgument[];
  readonly arguments: readonly Expression[];
}

export interface SuperConstructorInvocation extends BasePrimary {
  readonly type: 'SuperConstructorInvocation';
  readonly typeArguments: readonly TypeArgument[];
  readonly arguments: readonly Expression[];
}

export interface SuperMethodInvocation extends BasePrimary {
  readonly type: 'SuperMethodInvocation';
  readonly typeArguments: readonly TypeArgument[];
  readonly member: string;
  readonly arguments: readonly Expression[];
}

export interface SuperMemberReference extends BasePrimary {
  readonly type: 'SuperMemberReference';
  readonly member: string;
}

/** `Foo.class`, `int[].class` */
export interface ClassReference extends BasePrimary {
  readonly type: 'ClassReference';
  readonly classType: Type;
}

export interface VoidClassReference extends BasePrimary {
  readonly type: 'VoidClassReference';
}

/** An array type used as a method-reference target: `int[]::clone`. */
export interface TypeReference extends BasePrimary {
  readonly type: 'TypeReference';
  readonly referencedType: Type;
}

export interface ClassCreator extends BasePrimary {
  readonly type: 'ClassCreator';
  readonly constructorTypeArguments: readonly TypeArgument[];
  readonly createdType: ReferenceType;
  readonly arguments: readonly Expression[];
  /** Anonymous class body, or `null`. */
  readonly body: readonly MemberDeclaration[] | null;
}

/** `outer.new Inner()` */
export interface InnerClassCreator extends BasePrimary {
  readonly type: 'InnerClassCreator';
  readonly constructorTypeArguments: readonly TypeArgument[];
  readonly createdType: ReferenceType;
  readonly arguments: readonly Expression[];
  readonly body: readonly MemberDeclaration[] | null;
}

export interface ArrayCreator extends BasePrimary {
  readonly type: 'ArrayCreator';
  readonly createdType: Type;
  /** One entry per `[]`; `null` where no size is given. */
  readonly dimensions: readonly (Expression | null)[];
  readonly initializer: ArrayInitializer | null;
}

export interface ArraySelector extends BasePrimary {
  readonly type: 'ArraySelector';
  readonly index: Expression;
}

export interface SwitchExpression extends BasePrimary {
  readonly type: 'SwitchExpression';
  readonly selector: Expression;
  readonly rules: readonly SwitchRule[];
}

/////////////////////////
// Aggregate unions    //
/////////////////////////

export type Node =
  | CompilationUnit
  | PackageDeclaration
  | Import
  | MemberDeclaration
  | EnumConstantDeclaration
  | TypeParameter
  | Annotation
  | ElementValuePair
  | ElementArrayValue
  | FormalParameter
  | InferredFormalParameter
  | VariableDeclarator
  | ArrayInitializer
  | VariableDeclaration
  | Type
  | TypeArgument
  | Statement
  | SwitchStatementCase
  | SwitchRule
  | DefaultLabel
  | ForControl
  | EnhancedForControl
  | TryResource
  | CatchClause
  | CatchClauseParameter
  | Pattern
  | Expression
  | ArraySelector;

export type NodeType = Node['type'];
