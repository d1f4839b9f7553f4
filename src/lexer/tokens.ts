export enum TokenType {
  COMMENT = 'COMMENT',
  ENTITY_DECLARATION = 'ENTITY_DECLARATION',   // Deportista, Lista
  DOMAIN_TYPE = 'DOMAIN_TYPE',                 // Pais, Deporte, Resultado
  CONTROL_FLOW = 'CONTROL_FLOW',               // si, entonces, Repetir, ...
  FUNCTION_INVOCATION = 'FUNCTION_INVOCATION', // narrar(, comparar(, input(
  DOMAIN_KEYWORD = 'DOMAIN_KEYWORD',           // InicioCarrera, finact, ...
  RESULT_MARKER = 'RESULT_MARKER',             // listaRes
  TIE_MARKER = 'TIE_MARKER',                   // empate
  COMPARISON_OPERATOR = 'COMPARISON_OPERATOR', // == != >= <= > <
  SPECIAL_OPERATOR = 'SPECIAL_OPERATOR',       // vs
  ARITHMETIC_OPERATOR = 'ARITHMETIC_OPERATOR', // + - * / %
  INTEGER = 'INTEGER',
  STRING = 'STRING',
  BOOLEAN = 'BOOLEAN',
  IDENTIFIER = 'IDENTIFIER',
  PUNCTUATION = 'PUNCTUATION',                 // ( ) , : { } [ ] .
}

export const KEYWORDS: Record<string, TokenType> = {
  'Deportista': TokenType.ENTITY_DECLARATION,
  'Lista': TokenType.ENTITY_DECLARATION,

  'Pais': TokenType.DOMAIN_TYPE,
  'Deporte': TokenType.DOMAIN_TYPE,
  'Resultado': TokenType.DOMAIN_TYPE,

  'si': TokenType.CONTROL_FLOW,
  'entonces': TokenType.CONTROL_FLOW,
  'sino': TokenType.CONTROL_FLOW,
  'endif': TokenType.CONTROL_FLOW,
  'Repetir': TokenType.CONTROL_FLOW,
  'FinRep': TokenType.CONTROL_FLOW,
  'RepetirHasta': TokenType.CONTROL_FLOW,
  'FinRepHasta': TokenType.CONTROL_FLOW,
  'FinRepHast': TokenType.CONTROL_FLOW,

  'InicioCarrera': TokenType.DOMAIN_KEYWORD,
  'InicioRutina': TokenType.DOMAIN_KEYWORD,
  'InicioCombate': TokenType.DOMAIN_KEYWORD,
  'finact': TokenType.DOMAIN_KEYWORD,
  'finCarr': TokenType.DOMAIN_KEYWORD,
  'finRuti': TokenType.DOMAIN_KEYWORD,
  'finComb': TokenType.DOMAIN_KEYWORD,
  'finprep': TokenType.DOMAIN_KEYWORD,
  'preparacion': TokenType.DOMAIN_KEYWORD,
  'correr': TokenType.DOMAIN_KEYWORD,
  'ejecutar': TokenType.DOMAIN_KEYWORD,
  'combatir': TokenType.DOMAIN_KEYWORD,
  'ceremonia_medallas': TokenType.DOMAIN_KEYWORD,
  'competencia_oficial': TokenType.DOMAIN_KEYWORD,
  'partido_clasificatorio': TokenType.DOMAIN_KEYWORD,

  'listaRes': TokenType.RESULT_MARKER,
  'empate': TokenType.TIE_MARKER,

  'True': TokenType.BOOLEAN,
  'False': TokenType.BOOLEAN,

  'vs': TokenType.SPECIAL_OPERATOR,
};

/** Words that form a single FUNCTION_INVOCATION token when directly followed by `(`. */
export const FUNCTION_NAMES = new Set(['narrar', 'comparar', 'Comparar', 'input']);

export const COMPARISON_OPERATORS = ['==', '!=', '>=', '<=', '>', '<'];
export const ARITHMETIC_OPERATORS = new Set(['+', '-', '*', '/', '%']);
export const PUNCTUATION = new Set(['(', ')', ',', ':', '{', '}', '[', ']', '.']);

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly line: number;
  readonly column: number;
}

export interface LexerError {
  message: string;
  line: number;
  column: number;
}
