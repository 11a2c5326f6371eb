import { describe, it, expect } from 'vitest'
import { ProtoError } from '../errors/index.js'
import { createArrayLineSource, line } from './scanner.js'
import { createRpcVisitor, matchRpcDeclaration, parseParameters } from './rpc-visitor.js'

/**
 * Visit the first line, with the remaining lines as the shared source
 */
function visit(lines: string[], namespace = 'acme.v1.Echo') {
  const [first, ...rest] = lines
  const source = createArrayLineSource(rest.map((syntax) => line(syntax)))
  const result = createRpcVisitor().visit(source, line(first), namespace)
  return { result, rpc: result.entity, source }
}

describe('matchRpcDeclaration', () => {
  it('should capture name, arguments and trailer', () => {
    expect(matchRpcDeclaration('rpc Say(SayRequest) returns (SayReply);')).toEqual({
      name: 'Say',
      inArgs: 'SayRequest',
      outArgs: 'SayReply',
      trailer: ';',
    })
  })

  it('should keep argument text verbatim', () => {
    expect(matchRpcDeclaration('rpc Say ( A ) returns ( B ) {')).toEqual({
      name: 'Say',
      inArgs: 'A ',
      outArgs: 'B ',
      trailer: ' {',
    })
  })

  it('should reject lines that are not declarations', () => {
    expect(matchRpcDeclaration('message Foo {')).toBeUndefined()
    expect(matchRpcDeclaration('rpc Say(A);')).toBeUndefined()
    expect(matchRpcDeclaration('option (x) = "rpc Say(A) returns (B)";')).toBeUndefined()
  })
})

describe('parseParameters', () => {
  it('should preserve declaration order', () => {
    expect(parseParameters('A, stream B')).toEqual([
      { streaming: false, typeName: 'A' },
      { streaming: true, typeName: 'B' },
    ])
  })

  it('should strip the stream keyword and surrounding whitespace', () => {
    expect(parseParameters(' stream   foo.Bar ')).toEqual([{ streaming: true, typeName: 'foo.Bar' }])
  })

  it('should not treat stream-prefixed type names as streaming', () => {
    expect(parseParameters('streamer.Type')).toEqual([{ streaming: false, typeName: 'streamer.Type' }])
    expect(parseParameters('stream')).toEqual([{ streaming: false, typeName: 'stream' }])
  })

  it('should accept empty segments as-is', () => {
    expect(parseParameters('')).toEqual([{ streaming: false, typeName: '' }])
    expect(parseParameters('A,')).toEqual([
      { streaming: false, typeName: 'A' },
      { streaming: false, typeName: '' },
    ])
  })
})

describe('RpcVisitor', () => {
  describe('canVisit', () => {
    it('should claim declaration lines only', () => {
      const visitor = createRpcVisitor()

      expect(visitor.canVisit(line('rpc Say(A) returns (B);'))).toBe(true)
      expect(visitor.canVisit(line('rpc Say(A) returns (B) {'))).toBe(true)
      expect(visitor.canVisit(line('service Echo {'))).toBe(false)
      expect(visitor.canVisit(line('option (x) = 1;'))).toBe(false)
    })

    it('should claim declarations with leading whitespace', () => {
      const visitor = createRpcVisitor()

      expect(visitor.canVisit(line('  rpc Second(C) returns (D);'))).toBe(true)
      expect(visitor.canVisit(line('\trpc Second(C) returns (D) {'))).toBe(true)
      expect(visitor.canVisit(line('  option (x) = "rpc Say(A) returns (B)";'))).toBe(false)
    })
  })

  describe('block-less declarations', () => {
    it('should return one input, one output and no options', () => {
      const { rpc, result } = visit(['rpc Say(SayRequest) returns (SayReply);'])

      expect(rpc).toEqual({
        namespace: 'acme.v1.Echo',
        name: 'Say',
        inputParameters: [{ streaming: false, typeName: 'SayRequest' }],
        outputParameters: [{ streaming: false, typeName: 'SayReply' }],
        options: [],
      })
      expect(result.reinspect).toBeUndefined()
    })

    it('should not consume further lines', () => {
      const { source } = visit(['rpc Say(A) returns (B);', 'rpc Next(A) returns (B);'])

      expect(source.scan()).toBe(true)
      expect(source.readLine().syntax).toBe('rpc Next(A) returns (B);')
    })

    it('should treat an empty block on the same line as complete', () => {
      const { rpc, source } = visit(['rpc Ping(Empty) returns (Empty) {}', 'rpc Next(A) returns (B);'])

      expect(rpc.options).toEqual([])
      expect(source.readLine().syntax).toBe('rpc Next(A) returns (B);')
    })

    it('should keep the line comment', () => {
      const source = createArrayLineSource([])
      const rpc = createRpcVisitor().visit(
        source,
        line('rpc Say(A) returns (B);', 'semicolon', 'Says hello.'),
        'acme'
      ).entity

      expect(rpc.comment).toBe('Says hello.')
    })
  })

  describe('parameters', () => {
    it('should mark streaming inputs', () => {
      const { rpc } = visit(['rpc Upload(stream Chunk) returns (Summary) {', '}'])

      expect(rpc.inputParameters).toEqual([{ streaming: true, typeName: 'Chunk' }])
      expect(rpc.outputParameters).toEqual([{ streaming: false, typeName: 'Summary' }])
    })

    it('should keep multiple parameters in order', () => {
      const { rpc } = visit(['rpc Mix(A, stream B) returns (C, D);'])

      expect(rpc.inputParameters).toEqual([
        { streaming: false, typeName: 'A' },
        { streaming: true, typeName: 'B' },
      ])
      expect(rpc.outputParameters).toEqual([
        { streaming: false, typeName: 'C' },
        { streaming: false, typeName: 'D' },
      ])
    })
  })

  describe('option blocks', () => {
    it('should gather a multi-line option into one body', () => {
      const { rpc, source } = visit([
        'rpc Create(CreateRequest) returns (Item) {',
        'option (google.api.http) = {',
        'post: "/v1/items"',
        'body: "*"',
        '};',
        '}',
      ])

      expect(rpc.options).toEqual([
        {
          scopePath: 'acme.v1.Echo.Create',
          optionName: 'google.api.http',
          optionIndex: '',
          optionBody: '{ post: "/v1/items" body: "*" };',
        },
      ])
      expect(source.scan()).toBe(false)
    })

    it('should track nested braces across lines', () => {
      const { rpc, source } = visit([
        'rpc Create(A) returns (B) {',
        'option (x.y) = {',
        'a: {',
        'b: 1',
        '}',
        'c: 2',
        '};',
        '}',
        'rpc After(A) returns (B);',
      ])

      expect(rpc.options.map((option) => option.optionBody)).toEqual(['{ a: { b: 1 } c: 2 };'])
      expect(source.readLine().syntax).toBe('rpc After(A) returns (B);')
    })

    it('should complete single-line options without reading ahead', () => {
      const { rpc } = visit([
        'rpc Get(GetRequest) returns (Item) {',
        'option (google.api.http).get = "/v1/items/{id}";',
        'option deprecated = true;',
        '}',
      ])

      expect(rpc.options).toEqual([
        {
          scopePath: 'acme.v1.Echo.Get',
          optionName: 'google.api.http',
          optionIndex: '',
          optionBody: '"/v1/items/{id}";',
        },
        {
          scopePath: 'acme.v1.Echo.Get',
          optionName: 'deprecated',
          optionIndex: '',
          optionBody: 'true;',
        },
      ])
    })

    it('should end an option on a bare semicolon line', () => {
      const { rpc } = visit(['rpc Get(A) returns (B) {', 'option (x) =', '"value"', ';', '}'])

      expect(rpc.options.map((option) => option.optionBody)).toEqual(['"value"'])
    })

    it('should skip options with an empty body', () => {
      const { rpc } = visit(['rpc Get(A) returns (B) {', 'option (x) =', ';', '}'])

      expect(rpc.options).toEqual([])
    })

    it('should ignore other statements inside the block', () => {
      const { rpc } = visit([
        'rpc Get(A) returns (B) {',
        'reserved 1;',
        'option (x) = "y";',
        'optional z;',
        '}',
      ])

      expect(rpc.options.map((option) => option.optionName)).toEqual(['x'])
    })

    it('should read indented option lines', () => {
      const { rpc } = visit([
        '  rpc Create(A) returns (B) {',
        '    option (google.api.http) = {',
        '      post: "/v1/items"',
        '    };',
        '    option deprecated = true;',
        '  }',
      ])

      expect(rpc.name).toBe('Create')
      expect(rpc.options.map((option) => [option.optionName, option.optionBody])).toEqual([
        ['google.api.http', '{ post: "/v1/items" };'],
        ['deprecated', 'true;'],
      ])
    })

    it('should accept the opening brace on the next line', () => {
      const { rpc } = visit(['rpc Get(A) returns (B)', '{', 'option (x) = "y";', '}'])

      expect(rpc.options.map((option) => option.optionBody)).toEqual(['"y";'])
    })

    it('should scope options to an empty namespace with a leading period', () => {
      const { rpc } = visit(['rpc Create(A) returns (B) {', 'option (x) = 1;', '}'], '')

      expect(rpc.options[0].scopePath).toBe('.Create')
    })
  })

  describe('recovery', () => {
    it('should hand back the next rpc when an option is never terminated', () => {
      const { rpc, result, source } = visit([
        'rpc First(A) returns (B) {',
        'option (google.api.http) = {',
        'get: "/v1/first"',
        'rpc Second(C) returns (D);',
        '}',
      ])

      expect(rpc.name).toBe('First')
      expect(rpc.options).toEqual([
        {
          scopePath: 'acme.v1.Echo.First',
          optionName: 'google.api.http',
          optionIndex: '',
          optionBody: '{ get: "/v1/first"',
        },
      ])
      expect(result.reinspect?.syntax).toBe('rpc Second(C) returns (D);')
      expect(source.readLine().syntax).toBe('}')
    })

    it('should hand back message and service starts', () => {
      const message = visit(['rpc A(X) returns (Y) {', 'option (o) = {', 'message Next {'])
      const service = visit(['rpc A(X) returns (Y) {', 'option (o) = {', 'service Next {'])

      expect(message.result.reinspect?.syntax).toBe('message Next {')
      expect(message.rpc.options.map((option) => option.optionBody)).toEqual(['{'])
      expect(service.result.reinspect?.syntax).toBe('service Next {')
    })

    it('should return what it has when input ends inside an option', () => {
      const { rpc, result } = visit(['rpc A(X) returns (Y) {', 'option (o) = {', 'a: 1'])

      expect(rpc.options.map((option) => option.optionBody)).toEqual(['{ a: 1'])
      expect(result.reinspect).toBeUndefined()
    })

    it('should return what it has when input ends inside the block', () => {
      const { rpc, result } = visit(['rpc A(X) returns (Y) {', 'option (o) = 1;'])

      expect(rpc.options.map((option) => option.optionBody)).toEqual(['1;'])
      expect(result.reinspect).toBeUndefined()
    })
  })

  it('should build identical RPCs from identical input', () => {
    const lines = [
      'rpc Create(A, stream B) returns (C) {',
      'option (google.api.http) = {',
      'post: "/v1/x"',
      '};',
      'option (z) = 1;',
      '}',
    ]

    expect(visit(lines).rpc).toEqual(visit(lines).rpc)
  })

  it('should throw when handed a line it does not claim', () => {
    const source = createArrayLineSource([])

    expect(() => createRpcVisitor().visit(source, line('message Foo {'), 'acme')).toThrow(ProtoError)
    expect(() => createRpcVisitor().visit(source, line('message Foo {'), 'acme')).toThrow(
      'Expected rpc declaration at line 0: message Foo {'
    )
  })
})
