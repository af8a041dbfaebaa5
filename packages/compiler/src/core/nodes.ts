/**
 * Syntax tree produced by the parser.
 *
 * Every node is a tagged variant (`kind`) carrying the source span it was
 * recognized from. Spans are offsets into the normalized source, never into
 * the layout text the grammar matched.
 */

import type { Span } from './source.ts'

interface BaseNode {
	readonly span: Span
}

// =============================================================================
// EXPRESSIONS
// =============================================================================

export interface NameExpr extends BaseNode {
	readonly kind: 'Name'
	readonly id: string
}

export interface NumberExpr extends BaseNode {
	readonly kind: 'Number'
	readonly text: string
}

export interface ConstantExpr extends BaseNode {
	readonly kind: 'Constant'
	readonly value: 'None' | 'True' | 'False' | '...'
}

/** Adjacent string literals, concatenated. */
export interface StringsExpr extends BaseNode {
	readonly kind: 'Strings'
	readonly parts: readonly StringLiteral[]
}

export interface TupleExpr extends BaseNode {
	readonly kind: 'Tuple'
	readonly elts: readonly Expr[]
}

export interface ListExpr extends BaseNode {
	readonly kind: 'List'
	readonly elts: readonly Expr[]
}

export interface SetExpr extends BaseNode {
	readonly kind: 'Set'
	readonly elts: readonly Expr[]
}

export interface DictExpr extends BaseNode {
	readonly kind: 'Dict'
	readonly entries: readonly DictEntry[]
}

export interface ComprehensionExpr extends BaseNode {
	readonly kind: 'ListComp' | 'SetComp' | 'GenExp'
	readonly elt: Expr
	readonly clauses: readonly CompClause[]
}

export interface DictCompExpr extends BaseNode {
	readonly kind: 'DictComp'
	readonly key: Expr
	readonly value: Expr
	readonly clauses: readonly CompClause[]
}

export interface ParenExpr extends BaseNode {
	readonly kind: 'Paren'
	readonly expr: Expr
}

export interface StarredExpr extends BaseNode {
	readonly kind: 'Starred'
	readonly value: Expr
}

export interface NamedExpr extends BaseNode {
	readonly kind: 'NamedExpr'
	readonly target: NameExpr
	readonly value: Expr
}

export type LambdaStyle = 'arrow' | 'keyword' | 'statement'

export interface LambdaExpr extends BaseNode {
	readonly kind: 'Lambda'
	readonly style: LambdaStyle
	readonly params: readonly Param[]
	readonly body: Expr
}

/** `body if test else orelse` */
export interface TernaryExpr extends BaseNode {
	readonly kind: 'Ternary'
	readonly body: Expr
	readonly test: Expr
	readonly orelse: Expr
}

export interface BoolOpExpr extends BaseNode {
	readonly kind: 'BoolOp'
	readonly op: 'and' | 'or'
	readonly values: readonly Expr[]
}

export interface NotExpr extends BaseNode {
	readonly kind: 'Not'
	readonly operand: Expr
}

export type CompareOp = '<' | '>' | '<=' | '>=' | '==' | '!=' | 'in' | 'not in' | 'is' | 'is not'

export interface CompareExpr extends BaseNode {
	readonly kind: 'Compare'
	readonly left: Expr
	readonly ops: readonly CompareOp[]
	readonly comparators: readonly Expr[]
}

export type PipeOp = '|>' | '|*>' | '|**>' | '<|'

/**
 * A pipe. Operands are kept in source order: the value is `left` for the
 * forward pipes and `right` for `<|`.
 */
export interface PipeExpr extends BaseNode {
	readonly kind: 'Pipe'
	readonly op: PipeOp
	readonly left: Expr
	readonly right: Expr
}

/** `f .. g .. h` applies h first. */
export interface ComposeExpr extends BaseNode {
	readonly kind: 'Compose'
	readonly funcs: readonly Expr[]
}

export interface BinOpExpr extends BaseNode {
	readonly kind: 'BinOp'
	readonly op: string
	readonly left: Expr
	readonly right: Expr
}

/** ``a `f` b`` */
export interface InfixCallExpr extends BaseNode {
	readonly kind: 'InfixCall'
	readonly func: string
	readonly left: Expr
	readonly right: Expr
}

export interface CustomOpExpr extends BaseNode {
	readonly kind: 'CustomOp'
	readonly op: string
	readonly opSpan: Span
	readonly left: Expr
	readonly right: Expr
}

export interface UnaryOpExpr extends BaseNode {
	readonly kind: 'UnaryOp'
	readonly op: '-' | '+' | '~'
	readonly operand: Expr
}

export interface AwaitExpr extends BaseNode {
	readonly kind: 'Await'
	readonly value: Expr
}

export interface CallExpr extends BaseNode {
	readonly kind: 'Call'
	readonly func: Expr
	readonly args: readonly Arg[]
}

/** `f$(args)` */
export interface PartialExpr extends BaseNode {
	readonly kind: 'Partial'
	readonly func: Expr
	readonly args: readonly Arg[]
}

export interface SubscriptExpr extends BaseNode {
	readonly kind: 'Subscript'
	readonly value: Expr
	readonly slices: readonly (Expr | SliceNode)[]
	/** `a[i,]` indexes with a one-element tuple */
	readonly trailingComma: boolean
}

export interface AttributeExpr extends BaseNode {
	readonly kind: 'Attribute'
	readonly value: Expr
	readonly attr: string
}

/** `.name` or `.name(args)` as a function of its object. */
export interface AttrPartialExpr extends BaseNode {
	readonly kind: 'AttrPartial'
	readonly attr: string
	readonly args: readonly Arg[] | null
}

/** `(+)` */
export interface OpFuncExpr extends BaseNode {
	readonly kind: 'OpFunc'
	readonly op: SectionOp
}

/** `(x +)` is a left section, `(+ x)` a right section. */
export interface SectionExpr extends BaseNode {
	readonly kind: 'Section'
	readonly op: SectionOp
	readonly side: 'left' | 'right'
	readonly operand: Expr
}

export interface YieldExpr extends BaseNode {
	readonly kind: 'Yield'
	readonly value: Expr | null
}

export interface YieldFromExpr extends BaseNode {
	readonly kind: 'YieldFrom'
	readonly value: Expr
}

export type Expr =
	| NameExpr
	| NumberExpr
	| ConstantExpr
	| StringsExpr
	| TupleExpr
	| ListExpr
	| SetExpr
	| DictExpr
	| ComprehensionExpr
	| DictCompExpr
	| ParenExpr
	| StarredExpr
	| NamedExpr
	| LambdaExpr
	| TernaryExpr
	| BoolOpExpr
	| NotExpr
	| CompareExpr
	| PipeExpr
	| ComposeExpr
	| BinOpExpr
	| InfixCallExpr
	| CustomOpExpr
	| UnaryOpExpr
	| AwaitExpr
	| CallExpr
	| PartialExpr
	| SubscriptExpr
	| AttributeExpr
	| AttrPartialExpr
	| OpFuncExpr
	| SectionExpr
	| YieldExpr
	| YieldFromExpr

/**
 * An operator used as a function. Built-in symbols include the pipes and
 * `..`; backtick operators name a function.
 */
export type SectionOp =
	| { readonly type: 'builtin'; readonly symbol: string }
	| { readonly type: 'backtick'; readonly func: string }
	| { readonly type: 'custom'; readonly symbol: string; readonly span: Span }

// =============================================================================
// EXPRESSION PARTS
// =============================================================================

export interface StringLiteral extends BaseNode {
	readonly kind: 'StringLiteral'
	readonly prefix: string
	readonly quote: string
	/** Raw text between the quotes */
	readonly body: string
	/** Parsed body of a format string; null for plain strings */
	readonly segments: readonly FormatSegment[] | null
}

export interface FormatText extends BaseNode {
	readonly kind: 'FormatText'
	readonly text: string
}

export interface FormatField extends BaseNode {
	readonly kind: 'FormatField'
	readonly expr: Expr
	/** Raw expression text plus `=` for self-documenting fields */
	readonly debug: string | null
	readonly conversion: string | null
	readonly spec: readonly FormatSegment[] | null
}

export type FormatSegment = FormatText | FormatField

export interface PositionalArg extends BaseNode {
	readonly kind: 'PositionalArg'
	readonly value: Expr
}

export interface KeywordArg extends BaseNode {
	readonly kind: 'KeywordArg'
	readonly name: string
	readonly value: Expr
}

export interface StarArg extends BaseNode {
	readonly kind: 'StarArg'
	readonly value: Expr
}

export interface KwStarArg extends BaseNode {
	readonly kind: 'KwStarArg'
	readonly value: Expr
}

/** `?` in a call's argument list */
export interface PlaceholderArg extends BaseNode {
	readonly kind: 'PlaceholderArg'
}

export type Arg = PositionalArg | KeywordArg | StarArg | KwStarArg | PlaceholderArg

export type ParamMode = 'plain' | 'varargs' | 'kwargs' | 'kwMarker' | 'posMarker'

export interface Param extends BaseNode {
	readonly kind: 'Param'
	readonly mode: ParamMode
	readonly name: string | null
	readonly annotation: Expr | null
	readonly default: Expr | null
}

export interface SliceNode extends BaseNode {
	readonly kind: 'Slice'
	readonly lower: Expr | null
	readonly upper: Expr | null
	/** Present when a second ':' was written, even without a step value */
	readonly step: { readonly value: Expr | null } | null
}

export interface DictPair extends BaseNode {
	readonly kind: 'DictPair'
	readonly key: Expr
	readonly value: Expr
}

export interface DictSplat extends BaseNode {
	readonly kind: 'DictSplat'
	readonly value: Expr
}

export type DictEntry = DictPair | DictSplat

export interface CompFor extends BaseNode {
	readonly kind: 'CompFor'
	readonly isAsync: boolean
	readonly target: Expr
	readonly iter: Expr
}

export interface CompIf extends BaseNode {
	readonly kind: 'CompIf'
	readonly test: Expr
}

export type CompClause = CompFor | CompIf

// =============================================================================
// STATEMENTS
// =============================================================================

export interface ExprStmt extends BaseNode {
	readonly kind: 'ExprStmt'
	readonly value: Expr
}

export interface AssignStmt extends BaseNode {
	readonly kind: 'Assign'
	readonly targets: readonly Expr[]
	readonly value: Expr
}

export interface AugAssignStmt extends BaseNode {
	readonly kind: 'AugAssign'
	readonly target: Expr
	/** Operator without the trailing '=' */
	readonly op: string
	readonly value: Expr
}

export interface AnnAssignStmt extends BaseNode {
	readonly kind: 'AnnAssign'
	readonly target: Expr
	readonly annotation: Expr
	readonly value: Expr | null
}

export interface KeywordStmt extends BaseNode {
	readonly kind: 'Pass' | 'Break' | 'Continue'
}

export interface ReturnStmt extends BaseNode {
	readonly kind: 'Return'
	readonly value: Expr | null
}

export interface RaiseStmt extends BaseNode {
	readonly kind: 'Raise'
	readonly exc: Expr | null
	readonly cause: Expr | null
}

export interface ScopeStmt extends BaseNode {
	readonly kind: 'Global' | 'Nonlocal'
	readonly names: readonly string[]
}

export interface DelStmt extends BaseNode {
	readonly kind: 'Del'
	readonly targets: readonly Expr[]
}

export interface AssertStmt extends BaseNode {
	readonly kind: 'Assert'
	readonly test: Expr
	readonly msg: Expr | null
}

export interface Alias extends BaseNode {
	readonly kind: 'Alias'
	/** Dotted module or member name */
	readonly name: string
	readonly asname: string | null
}

export interface ImportStmt extends BaseNode {
	readonly kind: 'Import'
	readonly names: readonly Alias[]
}

export interface ImportFromStmt extends BaseNode {
	readonly kind: 'ImportFrom'
	/** Leading dots included */
	readonly module: string
	/** null for `import *` */
	readonly names: readonly Alias[] | null
}

export interface OperatorDeclStmt extends BaseNode {
	readonly kind: 'OperatorDecl'
	readonly op: string
}

export interface TypeAliasStmt extends BaseNode {
	readonly kind: 'TypeAlias'
	readonly name: string
	readonly value: Expr
}

export interface FunctionDefStmt extends BaseNode {
	readonly kind: 'FunctionDef'
	readonly name: string
	readonly decorators: readonly Expr[]
	readonly params: readonly Param[]
	readonly returns: Expr | null
	readonly body: readonly Stmt[]
	readonly isAsync: boolean
	/** `def f(x) = expr` */
	readonly assignment: boolean
}

export interface ClassDefStmt extends BaseNode {
	readonly kind: 'ClassDef'
	readonly name: string
	readonly decorators: readonly Expr[]
	readonly args: readonly Arg[] | null
	readonly body: readonly Stmt[]
}

export interface ElifClause extends BaseNode {
	readonly kind: 'Elif'
	readonly test: Expr
	readonly body: readonly Stmt[]
}

export interface IfStmt extends BaseNode {
	readonly kind: 'If'
	readonly test: Expr
	readonly body: readonly Stmt[]
	readonly elifs: readonly ElifClause[]
	readonly orelse: readonly Stmt[] | null
}

export interface WhileStmt extends BaseNode {
	readonly kind: 'While'
	readonly test: Expr
	readonly body: readonly Stmt[]
	readonly orelse: readonly Stmt[] | null
}

export interface ForStmt extends BaseNode {
	readonly kind: 'For'
	readonly target: Expr
	readonly iter: Expr
	readonly body: readonly Stmt[]
	readonly orelse: readonly Stmt[] | null
	readonly isAsync: boolean
}

export interface ExceptHandler extends BaseNode {
	readonly kind: 'ExceptHandler'
	readonly star: boolean
	readonly type: Expr | null
	readonly name: string | null
	readonly body: readonly Stmt[]
}

export interface TryStmt extends BaseNode {
	readonly kind: 'Try'
	readonly body: readonly Stmt[]
	readonly handlers: readonly ExceptHandler[]
	readonly orelse: readonly Stmt[] | null
	readonly finalbody: readonly Stmt[] | null
}

export interface WithItem extends BaseNode {
	readonly kind: 'WithItem'
	readonly context: Expr
	readonly target: Expr | null
}

export interface WithStmt extends BaseNode {
	readonly kind: 'With'
	readonly items: readonly WithItem[]
	readonly body: readonly Stmt[]
	readonly isAsync: boolean
}

export interface MatchCase extends BaseNode {
	readonly kind: 'MatchCase'
	readonly pattern: Pattern
	readonly guard: Expr | null
	readonly body: readonly Stmt[]
}

export interface MatchStmt extends BaseNode {
	readonly kind: 'Match'
	readonly subject: Expr
	readonly cases: readonly MatchCase[]
}

export type Stmt =
	| ExprStmt
	| AssignStmt
	| AugAssignStmt
	| AnnAssignStmt
	| KeywordStmt
	| ReturnStmt
	| RaiseStmt
	| ScopeStmt
	| DelStmt
	| AssertStmt
	| ImportStmt
	| ImportFromStmt
	| OperatorDeclStmt
	| TypeAliasStmt
	| FunctionDefStmt
	| ClassDefStmt
	| IfStmt
	| WhileStmt
	| ForStmt
	| TryStmt
	| WithStmt
	| MatchStmt

// =============================================================================
// PATTERNS
// =============================================================================

export interface CapturePattern extends BaseNode {
	readonly kind: 'CapturePattern'
	readonly name: string
}

export interface WildcardPattern extends BaseNode {
	readonly kind: 'WildcardPattern'
}

export interface ValuePattern extends BaseNode {
	readonly kind: 'ValuePattern'
	readonly dotted: string
}

export interface LiteralPattern extends BaseNode {
	readonly kind: 'LiteralPattern'
	readonly value: Expr
}

export interface OrPattern extends BaseNode {
	readonly kind: 'OrPattern'
	readonly patterns: readonly Pattern[]
}

export interface AsPattern extends BaseNode {
	readonly kind: 'AsPattern'
	readonly pattern: Pattern
	readonly name: string
}

export interface StarPattern extends BaseNode {
	readonly kind: 'StarPattern'
	readonly name: string
}

export interface SequencePattern extends BaseNode {
	readonly kind: 'SequencePattern'
	readonly items: readonly (Pattern | StarPattern)[]
}

export interface MappingItem extends BaseNode {
	readonly kind: 'MappingItem'
	readonly key: Expr
	readonly pattern: Pattern
}

export interface MappingPattern extends BaseNode {
	readonly kind: 'MappingPattern'
	readonly items: readonly MappingItem[]
	readonly rest: string | null
}

export interface KeywordPattern extends BaseNode {
	readonly kind: 'KeywordPattern'
	readonly name: string
	readonly pattern: Pattern
}

export interface ClassPattern extends BaseNode {
	readonly kind: 'ClassPattern'
	readonly cls: string
	readonly positional: readonly Pattern[]
	readonly keywords: readonly KeywordPattern[]
}

/** `x is int is str`; name is null for `_` */
export interface IsInstancePattern extends BaseNode {
	readonly kind: 'IsInstancePattern'
	readonly name: string | null
	readonly types: readonly string[]
}

export type Pattern =
	| CapturePattern
	| WildcardPattern
	| ValuePattern
	| LiteralPattern
	| OrPattern
	| AsPattern
	| SequencePattern
	| MappingPattern
	| ClassPattern
	| IsInstancePattern

// =============================================================================
// ROOTS
// =============================================================================

export interface Module extends BaseNode {
	readonly kind: 'Module'
	readonly body: readonly Stmt[]
}

/** Result of `eval` mode */
export interface Expression extends BaseNode {
	readonly kind: 'Expression'
	readonly value: Expr
}

export type SyntaxTree = Module | Expression

export type SyntaxNode =
	| Expr
	| Stmt
	| Pattern
	| StringLiteral
	| FormatSegment
	| Arg
	| Param
	| SliceNode
	| DictEntry
	| CompClause
	| Alias
	| ElifClause
	| ExceptHandler
	| WithItem
	| MatchCase
	| StarPattern
	| MappingItem
	| KeywordPattern
	| SyntaxTree

// =============================================================================
// TRAVERSAL
// =============================================================================

function present<T>(values: readonly (T | null)[]): T[] {
	const out: T[] = []
	for (const v of values) if (v !== null) out.push(v)
	return out
}

function suite(body: readonly Stmt[] | null): readonly Stmt[] {
	return body ?? []
}

/**
 * Direct children of a node, in source order.
 */
export function childrenOf(node: SyntaxNode): readonly SyntaxNode[] {
	switch (node.kind) {
		case 'Name':
		case 'Number':
		case 'Constant':
		case 'OpFunc':
		case 'PlaceholderArg':
		case 'FormatText':
		case 'Pass':
		case 'Break':
		case 'Continue':
		case 'Global':
		case 'Nonlocal':
		case 'Alias':
		case 'OperatorDecl':
		case 'CapturePattern':
		case 'WildcardPattern':
		case 'ValuePattern':
		case 'StarPattern':
		case 'IsInstancePattern':
			return []
		case 'Strings':
			return node.parts
		case 'StringLiteral':
			return node.segments ?? []
		case 'FormatField':
			return [node.expr, ...(node.spec ?? [])]
		case 'Tuple':
		case 'List':
		case 'Set':
			return node.elts
		case 'Dict':
			return node.entries
		case 'ListComp':
		case 'SetComp':
		case 'GenExp':
			return [node.elt, ...node.clauses]
		case 'DictComp':
			return [node.key, node.value, ...node.clauses]
		case 'Paren':
			return [node.expr]
		case 'Starred':
		case 'Await':
		case 'YieldFrom':
		case 'StarArg':
		case 'KwStarArg':
		case 'PositionalArg':
		case 'KeywordArg':
		case 'DictSplat':
		case 'ExprStmt':
			return [node.value]
		case 'NamedExpr':
			return [node.target, node.value]
		case 'Lambda':
			return [...node.params, node.body]
		case 'Ternary':
			return [node.body, node.test, node.orelse]
		case 'BoolOp':
			return node.values
		case 'Not':
		case 'UnaryOp':
			return [node.operand]
		case 'Compare':
			return [node.left, ...node.comparators]
		case 'Pipe':
		case 'BinOp':
		case 'InfixCall':
		case 'CustomOp':
			return [node.left, node.right]
		case 'Compose':
			return node.funcs
		case 'Call':
		case 'Partial':
			return [node.func, ...node.args]
		case 'Subscript':
			return [node.value, ...node.slices]
		case 'Attribute':
			return [node.value]
		case 'AttrPartial':
			return node.args ?? []
		case 'Section':
			return [node.operand]
		case 'Yield':
			return present([node.value])
		case 'Param':
			return present([node.annotation, node.default])
		case 'Slice':
			return present([node.lower, node.upper, node.step?.value ?? null])
		case 'DictPair':
			return [node.key, node.value]
		case 'CompFor':
			return [node.target, node.iter]
		case 'CompIf':
			return [node.test]
		case 'Assign':
			return [...node.targets, node.value]
		case 'AugAssign':
			return [node.target, node.value]
		case 'AnnAssign':
			return present([node.target, node.annotation, node.value])
		case 'Return':
			return present([node.value])
		case 'Raise':
			return present([node.exc, node.cause])
		case 'Del':
			return node.targets
		case 'Assert':
			return present([node.test, node.msg])
		case 'Import':
			return node.names
		case 'ImportFrom':
			return node.names ?? []
		case 'TypeAlias':
			return [node.value]
		case 'FunctionDef':
			return [...node.decorators, ...node.params, ...present([node.returns]), ...node.body]
		case 'ClassDef':
			return [...node.decorators, ...(node.args ?? []), ...node.body]
		case 'If':
			return [node.test, ...node.body, ...node.elifs, ...suite(node.orelse)]
		case 'Elif':
			return [node.test, ...node.body]
		case 'While':
			return [node.test, ...node.body, ...suite(node.orelse)]
		case 'For':
			return [node.target, node.iter, ...node.body, ...suite(node.orelse)]
		case 'Try':
			return [...node.body, ...node.handlers, ...suite(node.orelse), ...suite(node.finalbody)]
		case 'ExceptHandler':
			return [...present([node.type]), ...node.body]
		case 'With':
			return [...node.items, ...node.body]
		case 'WithItem':
			return present([node.context, node.target])
		case 'Match':
			return [node.subject, ...node.cases]
		case 'MatchCase':
			return [node.pattern, ...present([node.guard]), ...node.body]
		case 'LiteralPattern':
			return [node.value]
		case 'OrPattern':
			return node.patterns
		case 'AsPattern':
			return [node.pattern]
		case 'SequencePattern':
			return node.items
		case 'MappingPattern':
			return node.items
		case 'MappingItem':
			return [node.key, node.pattern]
		case 'ClassPattern':
			return [...node.positional, ...node.keywords]
		case 'KeywordPattern':
			return [node.pattern]
		case 'Module':
			return node.body
		case 'Expression':
			return [node.value]
	}
}

/**
 * Visit a node and its descendants in source order.
 * Returning false from the visitor skips the node's children.
 */
export function walk(node: SyntaxNode, visit: (node: SyntaxNode, parent: SyntaxNode | null) => boolean | void): void {
	const visitNode = (current: SyntaxNode, parent: SyntaxNode | null): void => {
		if (visit(current, parent) === false) return
		for (const child of childrenOf(current)) visitNode(child, current)
	}
	visitNode(node, null)
}
