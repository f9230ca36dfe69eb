/**
 * Spellings the external parser may use for node kinds and operators.
 *
 * Trees arrive either in the model's own camelCase kinds or in the parser's
 * class names; both normalize to the model's spelling.
 */

const KIND_ALIASES: ReadonlyMap<string, string> = new Map([
  ["Program", "program"],
  ["Module", "program"],
  ["FunctionDef", "functionDef"],
  ["ClassDef", "classDef"],
  ["Assign", "assign"],
  ["AugAssign", "augAssign"],
  ["If", "if"],
  ["For", "for"],
  ["While", "while"],
  ["Return", "return"],
  ["ExprStmt", "expressionStatement"],
  ["Expr", "expressionStatement"],
  ["Pass", "pass"],
  ["Break", "break"],
  ["Continue", "continue"],
  ["Import", "import"],
  ["ImportFrom", "import"],
  ["Constant", "constant"],
  ["Name", "name"],
  ["Call", "call"],
  ["BinOp", "binOp"],
  ["Compare", "compare"],
  ["Attribute", "attribute"],
  ["Subscript", "subscript"],
  ["ListLit", "list"],
  ["List", "list"],
  ["DictLit", "dict"],
  ["Dict", "dict"],
  ["TupleLit", "tuple"],
  ["Tuple", "tuple"],
  ["UnaryOp", "unaryOp"],
  ["BoolOp", "boolOp"],
  ["Conditional", "conditional"],
  ["IfExp", "conditional"],
]);

const OPERATOR_ALIASES: ReadonlyMap<string, string> = new Map([
  ["Add", "+"],
  ["Sub", "-"],
  ["Mult", "*"],
  ["Div", "/"],
  ["FloorDiv", "//"],
  ["Mod", "%"],
  ["Pow", "**"],
  ["LShift", "<<"],
  ["RShift", ">>"],
  ["BitAnd", "&"],
  ["BitOr", "|"],
  ["BitXor", "^"],
  ["Eq", "=="],
  ["NotEq", "!="],
  ["Lt", "<"],
  ["LtE", "<="],
  ["Gt", ">"],
  ["GtE", ">="],
  ["Is", "is"],
  ["IsNot", "is not"],
  ["In", "in"],
  ["NotIn", "not in"],
  ["Not", "not"],
  ["USub", "-"],
  ["UAdd", "+"],
  ["Invert", "~"],
  ["And", "and"],
  ["Or", "or"],
]);

export const normalizeKind = (kind: string): string =>
  KIND_ALIASES.get(kind) ?? kind;

export const normalizeOperator = (operator: string): string =>
  OPERATOR_ALIASES.get(operator) ?? operator;
