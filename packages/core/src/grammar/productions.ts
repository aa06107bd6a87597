// Schema-independent parts of the grammar. Tables and columns are spliced
// in between HEAD and TAIL by synthesize().

export const GRAMMAR_HEAD = `// Generated SQL grammar (Lark syntax). Do not edit by hand.

// ---------- Whitespace ----------
SP: " "

// ---------- Punctuation ----------
COMMA: ","
SEMI: ";"
LPAREN: "("
RPAREN: ")"

// ---------- Operators ----------
GT: ">"
LT: "<"
GTE: ">="
LTE: "<="
EQ: "="
NEQ: "!="

// ---------- Start ----------
start: select_stmt SEMI

// ---------- SELECT statement ----------
select_stmt: "SELECT" SP select_list SP "FROM" SP table (SP where_clause)? (SP group_clause)? (SP order_clause)? (SP limit_clause)?

// ---------- Select list ----------
select_list: select_item (COMMA SP select_item)*
select_item: agg_expr | column | star
star: "*"

// ---------- Aggregation ----------
agg_expr: agg_func LPAREN agg_arg RPAREN (SP "AS" SP alias)?
agg_func: "SUM" | "COUNT" | "AVG" | "MIN" | "MAX"
agg_arg: column | star
alias: IDENTIFIER
`;

export const GRAMMAR_TAIL = `// ---------- WHERE clause ----------
where_clause: "WHERE" SP condition (SP "AND" SP condition)*
condition: column SP compare_op SP value
compare_op: GTE | LTE | GT | LT | EQ | NEQ
value: STRING | NUMBER | DATETIME

// ---------- GROUP BY ----------
group_clause: "GROUP" SP "BY" SP column (COMMA SP column)*

// ---------- ORDER BY ----------
order_clause: "ORDER" SP "BY" SP sort_item (COMMA SP sort_item)*
sort_item: column (SP sort_dir)?
sort_dir: "ASC" | "DESC"

// ---------- LIMIT ----------
limit_clause: "LIMIT" SP NUMBER

// ---------- Terminals ----------
IDENTIFIER: /[A-Za-z_][A-Za-z0-9_]*/
NUMBER: /[0-9]+(\\.[0-9]+)?/
STRING: /'[^']*'/
DATETIME: /'[0-9]{4}-[0-9]{2}-[0-9]{2}( [0-9]{2}:[0-9]{2}:[0-9]{2})?'/
`;

export const SUPPORTED_OPERATIONS = `Supported operations:
- SELECT with columns or aggregates (SUM, COUNT, AVG, MIN, MAX)
- WHERE with comparisons (=, !=, >, <, >=, <=) joined by AND
- GROUP BY columns
- ORDER BY columns (ASC/DESC)
- LIMIT

YOU MUST generate syntactically valid SQL that conforms to the grammar.`;
