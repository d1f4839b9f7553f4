import { Lexer } from '../src/lexer/lexer';
import { Parser, DEFAULT_MAX_DEPTH } from '../src/parser/parser';
import { Verifier, VerificationResult, resolveArgType } from '../src/semantic/verifier';
import { SymbolTable } from '../src/semantic/symbol-table';
import * as AST from '../src/parser/ast';

describe('Verifier', () => {
  function check(source: string, trace = false): { ast: AST.Program; result: VerificationResult } {
    const ast = new Parser().parse(new Lexer(source).tokenize());
    const result = new Verifier({ trace }).verify(ast);
    return { ast, result };
  }

  function messages(result: VerificationResult): string[] {
    return result.errors.map(e => e.message);
  }

  describe('declarations', () => {
    it('should decorate an athlete and resolve it in narrar', () => {
      const { ast, result } = check('Deportista A 1 2 3 Futbol P\nnarrar(A)');
      expect(ast.diagnostics).toEqual([]);
      expect(result.errors).toEqual([]);
      const [decl, narrate] = ast.children;
      expect(result.decorations.get(decl.id)).toEqual({ type: 'entity:Deportista', definition: 'A' });
      expect(result.decorations.get(narrate.id)).toEqual({
        type: 'void',
        callee: 'narrar',
        argTypes: ['entity:Deportista'],
      });
    });

    it('should report a use before the declaration', () => {
      const { ast, result } = check('narrar(X)\nDeportista X 1 2 3 Futbol P');
      expect(ast.diagnostics).toEqual([]);
      expect(result.errors).toEqual([
        { message: "Identifier 'X' used before being declared", line: 1, column: 1, severity: 'error', phase: 'semantic' },
      ]);
    });

    it('should report a duplicate in the same scope once', () => {
      const { result } = check('Deportista A 1 2 3 F P\nDeportista A 4 5 6 F P');
      expect(result.errors).toEqual([
        {
          message: "Duplicate declaration: 'A' already exists in the current scope (level 0)",
          line: 2,
          column: 1,
          severity: 'error',
          phase: 'semantic',
        },
      ]);
    });

    it('should allow the same name again inside a loop', () => {
      const { result } = check('Deportista A 1 2 3 F P\nRepetir (2) [ Deportista A 4 5 6 F P ] FinRep');
      expect(result.errors).toEqual([]);
    });

    it('should declare a list but not the athletes of a bulk load', () => {
      const { ast, result } = check('Lista Deportista L\nLista Deportista Ana 1 2 3 F P');
      const [list, bulk] = ast.children;
      expect(result.decorations.get(list.id)).toEqual({ type: 'list:Deportista', definition: 'L' });
      expect(result.decorations.get(bulk.id)).toEqual({ type: 'list:Deportista', count: 1 });
      expect(result.table.lookup('L')?.type).toBe('list:Deportista');
      expect(result.table.lookup('Ana')).toBeUndefined();
    });
  });

  describe('scopes', () => {
    it('should hide names declared inside a conditional', () => {
      const { result } = check('Deportista A 1 2 3 F P\nsi A entonces { Deportista B 1 2 3 F P } endif\nnarrar(B)');
      expect(result.errors).toEqual([
        { message: "Identifier 'B' used before being declared", line: 3, column: 1, severity: 'error', phase: 'semantic' },
      ]);
      expect(result.table.lookup('A')).toBeDefined();
      expect(result.table.lookup('B')).toBeUndefined();
    });

    it('should hide names declared inside a loop', () => {
      const { result } = check('Repetir (2) [ Deportista B 1 2 3 F P ] FinRep\nnarrar(B)');
      expect(result.errors).toEqual([
        { message: "Identifier 'B' used before being declared", line: 2, column: 1, severity: 'error', phase: 'semantic' },
      ]);
      expect(result.table.lookup('B')).toBeUndefined();
    });

    it('should hide names declared inside a loop-until', () => {
      const { result } = check('RepetirHasta (1) [ Deportista B 1 2 3 F P ] FinRepHasta\nnarrar(B)');
      expect(result.errors).toEqual([
        { message: "Identifier 'B' used before being declared", line: 2, column: 1, severity: 'error', phase: 'semantic' },
      ]);
      expect(result.table.lookup('B')).toBeUndefined();
    });

    it('should decorate loops with their scope level and count', () => {
      const { ast, result } = check('Repetir (2) [ ] FinRep', true);
      expect(result.decorations.get(ast.children[0].id)).toEqual({ type: 'void', scopeLevel: 1, count: 2 });
      expect(result.trace).toEqual(['Enter scope -> level 1 (Loop at line 1)', 'Exit scope -> level 0']);
    });

    it('should leave the trace empty unless asked', () => {
      const { result } = check('Repetir (2) [ ] FinRep');
      expect(result.trace).toEqual([]);
    });
  });

  describe('names', () => {
    it('should treat a name read off a list as a method', () => {
      const { ast, result } = check('Lista Deportista equipo\nequipo.agregar');
      expect(result.errors).toEqual([]);
      const method = ast.children[3];
      expect(method.content).toBe('agregar');
      expect(result.decorations.get(method.id)).toMatchObject({ type: 'unknown', methodOf: 'equipo' });
    });

    it('should not treat a name read off an athlete as a method', () => {
      const { result } = check('Deportista A 1 2 3 F P\nA.agregar');
      expect(messages(result)).toEqual(["Identifier 'agregar' used before being declared"]);
    });

    it('should not report names inside a broken declaration', () => {
      const { ast, result } = check('Deportista Ana 10 20 Futbol Chile');
      expect(ast.diagnostics).toHaveLength(1);
      expect(result.errors).toEqual([]);
    });

    it('should attach the resolved declaration to a name', () => {
      const { ast, result } = check('Deportista A 1 2 3 F P\nA');
      expect(result.decorations.get(ast.children[1].id)).toEqual({
        type: 'entity:Deportista',
        ref: { name: 'A', type: 'entity:Deportista', line: 1, scopeLevel: 0 },
      });
    });
  });

  describe('expressions', () => {
    function conditionExpr(ast: AST.Program): AST.Node {
      return ast.children[0].children[0].children[0];
    }

    it('should report adding text and a number', () => {
      const { ast, result } = check('si "a" + 1 entonces { } endif');
      expect(result.errors).toEqual([
        { message: 'Cannot add text and number', line: 1, column: 8, severity: 'error', phase: 'semantic' },
      ]);
      expect(result.decorations.get(conditionExpr(ast).id)).toEqual({
        type: 'unknown',
        operator: '+',
        left: 'string',
        right: 'int',
      });
    });

    it('should type integer arithmetic as int', () => {
      const { ast, result } = check('si 1 + 2 * 3 entonces { } endif');
      expect(result.errors).toEqual([]);
      expect(result.decorations.typeOf(conditionExpr(ast).id)).toBe('int');
    });

    it('should type text concatenation as string', () => {
      const { ast, result } = check('si "a" + "b" entonces { } endif');
      expect(result.decorations.typeOf(conditionExpr(ast).id)).toBe('string');
    });

    it('should degrade other combinations to unknown without an error', () => {
      const { ast, result } = check('si "a" * 2 entonces { } endif');
      expect(result.errors).toEqual([]);
      expect(result.decorations.typeOf(conditionExpr(ast).id)).toBe('unknown');
    });

    it('should type a long chain without running out of stack', () => {
      const { ast, result } = check(`si ${'1 + '.repeat(4999)}1 > 0 entonces { } endif`);
      expect(result.errors).toEqual([]);
      expect(result.decorations.get(conditionExpr(ast).id)).toEqual({
        type: 'unknown',
        operator: '>',
        left: 'int',
        right: 'int',
      });
    });

    it('should report a mismatch at the end of a long chain once', () => {
      const { result } = check(`si ${'1 + '.repeat(2999)}"x" entonces { } endif`);
      expect(result.errors).toEqual([
        { message: 'Cannot add text and number', line: 1, column: 11998, severity: 'error', phase: 'semantic' },
      ]);
    });

    it('should verify conditionals nested past the depth bound', () => {
      const { ast, result } = check('si x entonces {\n'.repeat(3000) + '} endif\n'.repeat(3000));
      expect(ast.diagnostics).toHaveLength(1);
      expect(result.errors).toHaveLength(DEFAULT_MAX_DEPTH);
      expect(new Set(messages(result))).toEqual(new Set(["Identifier 'x' used before being declared"]));
    });

    it('should give the condition the type of its expression', () => {
      const { ast, result } = check('si 1 + 2 entonces { } endif');
      expect(result.decorations.typeOf(ast.children[0].children[0].id)).toBe('int');
    });
  });

  describe('invocations', () => {
    const athletes = 'Deportista A 1 2 3 F P\nDeportista B 4 5 6 F P\n';

    it('should accept comparar on two athletes', () => {
      const { ast, result } = check(`${athletes}comparar(A, B)`);
      expect(result.errors).toEqual([]);
      expect(result.decorations.get(ast.children[2].id)).toEqual({
        type: 'int',
        callee: 'comparar',
        argTypes: ['entity:Deportista', 'entity:Deportista'],
      });
    });

    it('should check the arity of comparar', () => {
      const { result } = check(`${athletes}comparar(A)`);
      expect(messages(result)).toEqual(['comparar expects 2 arguments but got 1']);
    });

    it('should require entities as comparar arguments', () => {
      const { result } = check('Lista Deportista L\ncomparar(L, 3)');
      expect(messages(result)).toEqual([
        "Argument 1 of comparar must be an entity, found 'list:Deportista'",
        "Argument 2 of comparar must be an entity, found 'int'",
      ]);
    });

    it('should check the arity of input only', () => {
      expect(messages(check('input()').result)).toEqual(['input expects 1 argument but got 0']);
      expect(messages(check('input(Nadie)').result)).toEqual([]);
    });

    it('should resolve a nested call to its return type', () => {
      const { ast, result } = check(`${athletes}narrar(comparar(A, B))`);
      expect(result.errors).toEqual([]);
      expect(result.decorations.get(ast.children[2].id)?.argTypes).toEqual(['int']);
    });
  });

  describe('results and competitions', () => {
    it('should report a free-standing result per missing slot', () => {
      const { ast, result } = check('Resultado 3 -');
      expect(messages(result)).toEqual(['Result is missing its second number']);
      expect(result.decorations.get(ast.children[0].id)).toEqual({ type: 'void', complete: false });
    });

    it('should report an incomplete result inside a match distinctly', () => {
      const { ast, result } = check('Chile vs Peru Resultado - 1 finact');
      expect(result.errors).toEqual([
        {
          message: 'Incomplete result in Match: missing first number',
          line: 1,
          column: 15,
          severity: 'error',
          phase: 'semantic',
        },
      ]);
      expect(result.decorations.get(ast.children[0].id)).toEqual({ type: 'void', complete: false });
    });

    it('should mark a well-formed match complete', () => {
      const { ast, result } = check('Chile vs Peru correr Resultado 2 - 1 finact');
      expect(result.errors).toEqual([]);
      expect(result.decorations.get(ast.children[0].id)).toEqual({ type: 'void', complete: true });
    });

    it('should report a match missing its second country', () => {
      const { result } = check('Chile vs Resultado 1 - 0 finact');
      expect(messages(result)).toEqual(['Match is missing its second country']);
    });

    it('should report a race without a result', () => {
      const { result } = check('InicioCarrera correr finCarr');
      expect(messages(result)).toEqual(['Race has no result']);
    });

    it('should report a race without its closing keyword', () => {
      const { result } = check('InicioCarrera Resultado 1 - 2');
      expect(messages(result)).toEqual(["Race is missing its closing keyword 'finCarr'"]);
    });
  });

  describe('snapshots', () => {
    it('should record the table after each declaration', () => {
      const { result } = check('Deportista A 1 2 3 F P\nLista Deportista L');
      expect(result.snapshots).toEqual([
        {
          step: 1,
          node: 'AthleteDecl',
          line: 1,
          table: { scope_0: { A: { name: 'A', type: 'entity:Deportista', line: 1, scopeLevel: 0 } } },
        },
        {
          step: 2,
          node: 'ListDecl',
          line: 2,
          table: {
            scope_0: {
              A: { name: 'A', type: 'entity:Deportista', line: 1, scopeLevel: 0 },
              L: { name: 'L', type: 'list:Deportista', line: 2, scopeLevel: 0 },
            },
          },
        },
      ]);
    });
  });

  it('should not mutate the tree it verifies', () => {
    const { ast } = check('Deportista A 1 2 3 F P\nnarrar(A)');
    const before = JSON.stringify(ast);
    new Verifier().verify(ast);
    expect(JSON.stringify(ast)).toBe(before);
  });
});

describe('resolveArgType()', () => {
  const table = new SymbolTable();

  it('should type quoted text as string', () => {
    expect(resolveArgType('"hola"', table)).toBe('string');
  });

  it('should type digits as int', () => {
    expect(resolveArgType('42', table)).toBe('int');
  });

  it('should type a built-in call by its return type', () => {
    expect(resolveArgType('comparar(A, B)', table)).toBe('int');
  });

  it('should default unknown names to unknown', () => {
    expect(resolveArgType('Nadie', table)).toBe('unknown');
  });
});
