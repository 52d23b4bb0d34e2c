/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import assert from 'node:assert'
import { test } from 'vitest'
import { z } from 'zod'
import type { AnyError, AnyResult, Empty } from './adapter-base'
import { AdapterError, err, isErr, ok, unwrap } from './adapter-base'
import type { Contract, ContractFn, PermissionedFn, QueryFn, ReplyFn } from './adapter-contract'
import type { Deps, DepsMut, ReadonlyStorage } from './adapter-deps'
import type { Reply } from './adapter-std'
import { customizeResponse, decustomizeDepsMut } from './adapter-customize'
import { fromJson, fromJsonBinary, toJson, toJsonBinary } from './adapter-json'
import { mockDependencies, mockEnv, mockInfo } from './adapter-mock'
import { Response, SubMsg } from './adapter-response'
import { ContractWrapper } from './adapter-wrapper'

test('execute dispatches decoded message',       testExecute)
test('malformed message is rejected',            testMalformedMessage)
test('callback errors are wrapped',              testCallbackErrors)
test('unpopulated entry points',                 testNotImplemented)
test('builder order does not matter',            testBuilderOrder)
test('builders replace and do not mutate',       testBuilderReplace)
test('message schemas',                          testSchemas)
test('custom messages pass through',             testDirectCustom)
test('baseline entry points are bridged',        testBridging)
test('bridged reply equals lifted direct call',  testBridgedReply)
test('custom message from baseline is fatal',    testUnreachable)
test('malformed message from baseline is fatal', testMalformedVariant)

type ExecuteMsg     = { increment: { by: number } } | { reset: {} }
type InstantiateMsg = { count: number }
type QueryMsg       = { count: {} }
type SudoMsg        = { set: { count: number } }
type MigrateMsg     = { version: string }
type CustomMsg      = { mint: { amount: string } }
type CustomQuery    = { price: { denom: string } }

const COUNT = new TextEncoder().encode('count')

const readCount = (storage: ReadonlyStorage): number => {
  const stored = storage.get(COUNT)
  return stored ? fromJson<number>(stored) : 0
}

const encode = (msg: unknown): Uint8Array => toJson(msg)

const env = mockEnv()

const reply: Reply = { id: 42, result: { ok: { events: [], data: null } } }

function unwrapErr <T> (result: AnyResult<T>): AnyError {
  if (isErr(result)) return result.Err
  throw new Error('expected an error result')
}

/** Counter contract written against the baseline environment. Records every call. */
function counter () {
  const calls: Array<[string, unknown]> = []
  const returned: Response<Empty>[] = []
  const respond = (response: Response<Empty>) => {
    returned.push(response)
    return ok(response)
  }
  const execute: ContractFn<ExecuteMsg, Empty, string, Empty> = (deps, env, info, msg) => {
    calls.push(['execute', msg])
    if ('reset' in msg) {
      deps.storage.set(COUNT, toJson(0))
      return respond(new Response<Empty>().addAttribute('action', 'reset'))
    }
    if (msg.increment.by < 0) return err('negative increment')
    if (msg.increment.by === 0) throw new Error('zero increment')
    deps.storage.set(COUNT, toJson(readCount(deps.storage) + msg.increment.by))
    return respond(new Response<Empty>()
      .addAttribute('action', 'increment')
      .addAttribute('sender', info.sender))
  }
  const instantiate: ContractFn<InstantiateMsg, Empty, string, Empty> = (deps, env, info, msg) => {
    calls.push(['instantiate', msg])
    deps.storage.set(COUNT, toJson(msg.count))
    return respond(new Response<Empty>().addAttribute('action', 'instantiate'))
  }
  const query: QueryFn<QueryMsg, string, Empty> = (deps, env, msg) => {
    calls.push(['query', msg])
    return ok(toJsonBinary({ count: readCount(deps.storage) }))
  }
  const sudo: PermissionedFn<SudoMsg, Empty, string, Empty> = (deps, env, msg) => {
    calls.push(['sudo', msg])
    deps.storage.set(COUNT, toJson(msg.set.count))
    return respond(new Response<Empty>().addAttribute('action', 'sudo'))
  }
  const reply: ReplyFn<Empty, string, Empty> = (deps, env, msg) => {
    calls.push(['reply', msg])
    if ('error' in msg.result) return err(`reply ${msg.id} failed: ${msg.result.error}`)
    return respond(new Response<Empty>()
      .addAttribute('reply', String(msg.id))
      .addMessage({ distribution: { withdraw_delegator_reward: { validator: 'mockvaloper1' } } }))
  }
  const migrate: PermissionedFn<MigrateMsg, Empty, string, Empty> = (deps, env, msg) => {
    calls.push(['migrate', msg])
    return respond(new Response<Empty>().addAttribute('version', msg.version))
  }
  return { calls, returned, execute, instantiate, query, sudo, reply, migrate }
}

export async function testExecute () {
  const contract = counter()
  const wrapper  = ContractWrapper.new(contract.execute, contract.instantiate, contract.query)
  const deps     = mockDependencies()
  const sender   = deps.api.addrMake('sender')

  const result = wrapper.execute(deps.asMut(), env, mockInfo(sender), encode({ increment: { by: 2 } }))
  const response = unwrap(result)
  assert.equal(response, contract.returned[0], 'response is passed through as it is')
  assert.deepEqual(response.attributes, [
    { key: 'action', value: 'increment' },
    { key: 'sender', value: sender },
  ])
  assert.deepEqual(contract.calls, [['execute', { increment: { by: 2 } }]])
  assert.equal(readCount(deps.storage), 2)

  const answer = unwrap(wrapper.query(deps.asRef(), env, encode({ count: {} })))
  assert.deepEqual(fromJsonBinary(answer), { count: 2 })
}

export async function testMalformedMessage () {
  const contract = counter()
  const wrapper  = ContractWrapper.new(contract.execute, contract.instantiate, contract.query)
  const deps     = mockDependencies()
  const info     = mockInfo(deps.api.addrMake('sender'))

  const truncated = unwrapErr(wrapper.execute(deps.asMut(), env, info, new TextEncoder().encode('{"increment":')))
  assert.ok(truncated instanceof AdapterError.MessageFormat)
  assert.ok(truncated.message.startsWith('Error parsing execute message: '))

  const binary = unwrapErr(wrapper.instantiate(deps.asMut(), env, info, new Uint8Array([0xff])))
  assert.ok(binary instanceof AdapterError.MessageFormat)
  assert.ok(binary.message.startsWith('Error parsing instantiate message: '))

  const query = unwrapErr(wrapper.query(deps.asRef(), env, new Uint8Array()))
  assert.ok(query instanceof AdapterError.MessageFormat)

  assert.deepEqual(contract.calls, [], 'callback is never invoked')
}

export async function testCallbackErrors () {
  const contract = counter()
  const wrapper  = ContractWrapper.new(contract.execute, contract.instantiate, contract.query)
  const deps     = mockDependencies()
  const info     = mockInfo(deps.api.addrMake('sender'))

  const returned = unwrapErr(wrapper.execute(deps.asMut(), env, info, encode({ increment: { by: -1 } })))
  assert.ok(returned instanceof AdapterError.Callback)
  assert.equal(returned.message, 'negative increment')
  assert.equal(returned.cause, 'negative increment')

  const thrown = unwrapErr(wrapper.execute(deps.asMut(), env, info, encode({ increment: { by: 0 } })))
  assert.ok(thrown instanceof AdapterError.Callback)
  assert.equal(thrown.message, 'zero increment')
  assert.ok(thrown.cause instanceof Error)

  assert.equal(contract.calls.length, 2)
  assert.equal(readCount(deps.storage), 0)
}

export async function testNotImplemented () {
  const contract = counter()
  const wrapper  = ContractWrapper.new(contract.execute, contract.instantiate, contract.query)
  const deps     = mockDependencies()

  for (const msg of [encode({ set: { count: 1 } }), new TextEncoder().encode('not json')]) {
    const sudo = unwrapErr(wrapper.sudo(deps.asMut(), env, msg))
    assert.ok(sudo instanceof AdapterError.NotImplemented)
    assert.equal(sudo.message, 'sudo is not implemented for contract')
    const migrate = unwrapErr(wrapper.migrate(deps.asMut(), env, msg))
    assert.ok(migrate instanceof AdapterError.NotImplemented)
    assert.equal(migrate.message, 'migrate is not implemented for contract')
  }

  const replied = unwrapErr(wrapper.reply(deps.asMut(), env, reply))
  assert.ok(replied instanceof AdapterError.NotImplemented)
  assert.equal(replied.message, 'reply is not implemented for contract')

  assert.deepEqual(contract.calls, [])
}

export async function testBuilderOrder () {
  const contract = counter()
  const base = ContractWrapper.new(contract.execute, contract.instantiate, contract.query)
  const forward = base
    .withSudo(contract.sudo)
    .withReply(contract.reply)
    .withMigrate(contract.migrate)
  const backward = base
    .withMigrate(contract.migrate)
    .withReply(contract.reply)
    .withSudo(contract.sudo)

  for (const wrapper of [forward, backward]) {
    contract.calls.length = 0
    const deps = mockDependencies()
    const info = mockInfo(deps.api.addrMake('admin'))
    unwrap(wrapper.instantiate(deps.asMut(), env, info, encode({ count: 1 })))
    unwrap(wrapper.execute(deps.asMut(), env, info, encode({ increment: { by: 1 } })))
    assert.deepEqual(fromJsonBinary(unwrap(wrapper.query(deps.asRef(), env, encode({ count: {} })))), { count: 2 })
    unwrap(wrapper.sudo(deps.asMut(), env, encode({ set: { count: 10 } })))
    assert.deepEqual(unwrap(wrapper.reply(deps.asMut(), env, reply)).attributes, [{ key: 'reply', value: '42' }])
    assert.deepEqual(unwrap(wrapper.migrate(deps.asMut(), env, encode({ version: '2' }))).attributes, [{ key: 'version', value: '2' }])
    assert.equal(readCount(deps.storage), 10)
    assert.deepEqual(contract.calls, [
      ['instantiate', { count: 1 }],
      ['execute',     { increment: { by: 1 } }],
      ['query',       { count: {} }],
      ['sudo',        { set: { count: 10 } }],
      ['reply',       reply],
      ['migrate',     { version: '2' }],
    ])
  }

  const failed = unwrapErr(forward.reply(mockDependencies().asMut(), env, {
    id: 7, result: { error: 'out of gas' }
  }))
  assert.ok(failed instanceof AdapterError.Callback)
  assert.equal(failed.message, 'reply 7 failed: out of gas')
}

export async function testBuilderReplace () {
  const contract = counter()
  const base = ContractWrapper.new(contract.execute, contract.instantiate, contract.query)
  const handler = (name: string): PermissionedFn<SudoMsg, Empty, string, Empty> =>
    () => ok(new Response<Empty>().addAttribute('handler', name))
  const replaced = base.withSudo(handler('first')).withSudo(handler('second'))
  const deps = mockDependencies()
  const response = unwrap(replaced.sudo(deps.asMut(), env, encode({ set: { count: 1 } })))
  assert.deepEqual(response.attributes, [{ key: 'handler', value: 'second' }])
  assert.ok(unwrapErr(base.sudo(deps.asMut(), env, encode({ set: { count: 1 } })))
    instanceof AdapterError.NotImplemented, 'original wrapper is unchanged')
}

export async function testSchemas () {
  const contract = counter()
  const ExecuteSchema = z.union([
    z.object({ increment: z.object({ by: z.number().int() }) }),
    z.object({ reset: z.object({}) }),
  ])
  const SudoSchema = z.object({ set: z.object({ count: z.number() }) })
  const wrapper = ContractWrapper.new(contract.execute, contract.instantiate, contract.query)
    .withSudo(contract.sudo)
    .withSchemas({ execute: ExecuteSchema, sudo: SudoSchema })
  const deps = mockDependencies()
  const info = mockInfo(deps.api.addrMake('sender'))

  const rejected = unwrapErr(wrapper.execute(deps.asMut(), env, info, encode({ increment: { by: '1' } })))
  assert.ok(rejected instanceof AdapterError.MessageFormat)
  assert.ok(rejected.message.startsWith('Error parsing execute message: '))
  assert.ok(unwrapErr(wrapper.sudo(deps.asMut(), env, encode({ set: {} })))
    instanceof AdapterError.MessageFormat)
  assert.deepEqual(contract.calls, [])

  unwrap(wrapper.execute(deps.asMut(), env, info, encode({ increment: { by: 3 } })))
  assert.equal(readCount(deps.storage), 3)

  // Populating the slot again drops its schema.
  const unchecked = wrapper.withSudo(contract.sudo)
  unwrap(unchecked.sudo(deps.asMut(), env, encode({ set: { count: 'many' } })))
  assert.deepEqual(contract.calls.at(-1), ['sudo', { set: { count: 'many' } }])
}

export async function testDirectCustom () {
  const execute: ContractFn<ExecuteMsg, CustomMsg, string, CustomQuery> = () =>
    ok(new Response<CustomMsg>().addMessage({ custom: { mint: { amount: '1' } } }))
  const instantiate: ContractFn<InstantiateMsg, CustomMsg, string, CustomQuery> = () =>
    ok(new Response<CustomMsg>())
  const query: QueryFn<QueryMsg, string, CustomQuery> = deps =>
    ok(toJsonBinary(deps.querier.query({ custom: { price: { denom: 'umock' } } })))
  const wrapper: Contract<CustomMsg, CustomQuery> = ContractWrapper.new(execute, instantiate, query)

  const deps = mockDependencies<CustomQuery>()
  deps.querier.withCustomHandler(({ price: { denom } })=>({
    Ok: { Ok: toJsonBinary({ denom, price: '2' }) }
  }))
  const info = mockInfo(deps.api.addrMake('sender'))
  const response = unwrap(wrapper.execute(deps.asMut(), env, info, encode({ reset: {} })))
  assert.deepEqual(response.messages.map(({ msg })=>msg), [{ custom: { mint: { amount: '1' } } }])
  const price = unwrap(wrapper.query(deps.asRef(), env, encode({ count: {} })))
  assert.deepEqual(fromJsonBinary(price), { denom: 'umock', price: '2' })
}

export async function testBridging () {
  const contract = counter()
  const seen: Array<Deps<Empty>|DepsMut<Empty>> = []
  const execute: ContractFn<ExecuteMsg, Empty, string, Empty> = (deps, env, info) => {
    seen.push(deps)
    const balance = deps.querier.queryBalance(info.sender, 'umock')
    return ok(new Response<Empty>()
      .addMessage({ bank: { send: { to_address: info.sender, amount: [balance] } } })
      .addSubmessage(SubMsg.replyOnSuccess<Empty>({ wasm: { execute: {
        contract_addr: env.contract.address, msg: toJsonBinary({ reset: {} }), funds: []
      } } }, 7).withGasLimit(50_000))
      .addSubmessage(SubMsg.replyAlways<Empty>({ stargate: {
        type_url: '/test.v1.MsgTest', value: 'AA=='
      } }, 8).withPayload('cGF5bG9hZA=='))
      .addAttribute('action', 'emit')
      .addEvent({ type: 'wasm-emit', attributes: [{ key: 'n', value: '3' }] })
      .setData('ZGF0YQ=='))
  }
  const query: QueryFn<QueryMsg, string, Empty> = (deps, env, msg) => {
    seen.push(deps)
    return contract.query(deps, env, msg)
  }
  const wrapper: Contract<CustomMsg, CustomQuery> = ContractWrapper.newWithEmpty<
    ExecuteMsg, InstantiateMsg, QueryMsg, string, string, string, CustomMsg, CustomQuery
  >(execute, contract.instantiate, query)

  const owned  = mockDependencies<CustomQuery>()
  const sender = owned.api.addrMake('sender')
  owned.querier.updateBalance(sender, [{ denom: 'umock', amount: '25' }])
  const deps   = owned.asMut()
  const response = unwrap(wrapper.execute(deps, env, mockInfo(sender), encode({ reset: {} })))

  assert.ok(response instanceof Response)
  assert.deepStrictEqual(response.messages.map(({ id, reply_on, gas_limit, payload, msg }) => ({
    id, reply_on, gas_limit, payload, msg
  })), [{
    id: 0, reply_on: 'never', gas_limit: null, payload: undefined,
    msg: { bank: { send: { to_address: sender, amount: [{ denom: 'umock', amount: '25' }] } } }
  }, {
    id: 7, reply_on: 'success', gas_limit: 50_000, payload: undefined,
    msg: { wasm: { execute: { contract_addr: env.contract.address, msg: 'eyJyZXNldCI6e319', funds: [] } } }
  }, {
    id: 8, reply_on: 'always', gas_limit: null, payload: 'cGF5bG9hZA==',
    msg: { stargate: { type_url: '/test.v1.MsgTest', value: 'AA==' } }
  }])
  assert.deepStrictEqual(response.attributes, [{ key: 'action', value: 'emit' }])
  assert.deepStrictEqual(response.events, [{ type: 'wasm-emit', attributes: [{ key: 'n', value: '3' }] }])
  assert.equal(response.data, 'ZGF0YQ==')

  assert.equal(seen[0].storage, owned.storage)
  assert.equal(seen[0].api, owned.api)
  assert.notEqual(seen[0].querier, deps.querier)
  assert.equal(seen[0].querier.querier, owned.querier)

  unwrap(wrapper.instantiate(deps, env, mockInfo(sender), encode({ count: 5 })))
  const shared = owned.asRef()
  const answer = unwrap(wrapper.query(shared, env, encode({ count: {} })))
  assert.deepEqual(fromJsonBinary(answer), { count: 5 })
  assert.equal(seen[1].storage, shared.storage)
  assert.notEqual(seen[1].querier, shared.querier)
}

export async function testBridgedReply () {
  const contract = counter()
  const wrapper = ContractWrapper.newWithEmpty<
    ExecuteMsg, InstantiateMsg, QueryMsg, string, string, string, CustomMsg, CustomQuery
  >(contract.execute, contract.instantiate, contract.query)
    .withReplyEmpty(contract.reply)
    .withSudoEmpty(contract.sudo)
    .withMigrateEmpty(contract.migrate)
  const owned = mockDependencies<CustomQuery>()

  const viaWrapper = unwrap(wrapper.reply(owned.asMut(), env, reply))
  const direct = unwrap(contract.reply(decustomizeDepsMut(owned.asMut()), env, reply))
  assert.deepStrictEqual(viaWrapper, customizeResponse<CustomMsg>(direct))
  assert.deepStrictEqual(viaWrapper.messages.map(({ msg })=>msg), [
    { distribution: { withdraw_delegator_reward: { validator: 'mockvaloper1' } } }
  ])

  unwrap(wrapper.sudo(owned.asMut(), env, encode({ set: { count: 4 } })))
  assert.equal(readCount(owned.storage), 4)
  const migrated = unwrap(wrapper.migrate(owned.asMut(), env, encode({ version: '3' })))
  assert.deepStrictEqual(migrated.attributes, [{ key: 'version', value: '3' }])
}

export async function testUnreachable () {
  const contract = counter()
  const rogue: ContractFn<ExecuteMsg, Empty, string, Empty> = () =>
    ok(new Response<Empty>().addMessage({ custom: {} }))
  const wrapper = ContractWrapper.newWithEmpty<
    ExecuteMsg, InstantiateMsg, QueryMsg, string, string, string, CustomMsg, CustomQuery
  >(rogue, contract.instantiate, contract.query)
  const deps = mockDependencies<CustomQuery>()
  const info = mockInfo(deps.api.addrMake('sender'))
  assert.throws(
    ()=>wrapper.execute(deps.asMut(), env, info, encode({ reset: {} })),
    (e: unknown)=>e instanceof AdapterError.Unreachable
  )
}

export async function testMalformedVariant () {
  const contract = counter()
  const malformed: ContractFn<ExecuteMsg, Empty, string, Empty> = () =>
    ok(new Response<Empty>().addMessage(JSON.parse('"gov"')))
  const wrapper = ContractWrapper.newWithEmpty<
    ExecuteMsg, InstantiateMsg, QueryMsg, string, string, string, CustomMsg, CustomQuery
  >(malformed, contract.instantiate, contract.query)
  const deps = mockDependencies<CustomQuery>()
  const info = mockInfo(deps.api.addrMake('sender'))
  assert.throws(
    ()=>wrapper.execute(deps.asMut(), env, info, encode({ reset: {} })),
    (e: unknown)=>(e instanceof AdapterError.UnknownVariant &&
      e.message === 'unknown message variant "gov"')
  )
}
