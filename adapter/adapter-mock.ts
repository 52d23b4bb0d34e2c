/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { bech32, sha256, base16 } from '@hackbg/4mat'
import type { Address, Empty } from './adapter-base'
import type {
  BankQuery, Coin, Env, MessageInfo, QueryRequest, SystemResult, WasmQuery
} from './adapter-std'
import type { Api, Deps, DepsMut, Order, Storage, StorageRecord, Querier } from './adapter-deps'
import { AdapterConsole, AdapterError, bold, displayError } from './adapter-base'
import { QuerierWrapper } from './adapter-deps'
import { fromJson, toBinary, toJsonBinary } from './adapter-json'
import defaultConfig, { AdapterConfig } from './adapter-config'

const log = new AdapterConsole('ContractWrapper: mock')

/** In-memory ordered key/value storage. */
export class MockStorage implements Storage {

  /** Entries keyed by the hex encoding of the key, which sorts like the bytes. */
  data = new Map<string, StorageRecord>()

  get (key: Uint8Array): Uint8Array|null {
    const entry = this.data.get(base16.encode(key))
    return entry ? Uint8Array.from(entry[1]) : null
  }

  set (key: Uint8Array, value: Uint8Array): void {
    if (value.length === 0) throw new AdapterError.EmptyValue()
    this.data.set(base16.encode(key), [Uint8Array.from(key), Uint8Array.from(value)])
  }

  remove (key: Uint8Array): void {
    this.data.delete(base16.encode(key))
  }

  range (start: Uint8Array|null, end: Uint8Array|null, order: Order = 'ascending'): StorageRecord[] {
    const lower = start ? base16.encode(start) : null
    const upper = end   ? base16.encode(end)   : null
    const keys = [...this.data.keys()]
      .filter(key=>(lower === null || key >= lower) && (upper === null || key < upper))
      .sort()
    if (order === 'descending') keys.reverse()
    const records: StorageRecord[] = []
    for (const key of keys) {
      const entry = this.data.get(key)
      if (entry) records.push([Uint8Array.from(entry[0]), Uint8Array.from(entry[1])])
    }
    return records
  }

}

/** Bech32 addresses with a fixed prefix. */
export class MockApi implements Api {

  constructor (readonly prefix: string = defaultConfig.addressPrefix) {}

  addrValidate (human: string): Address {
    const normalized = this.addrHumanize(this.addrCanonicalize(human))
    if (normalized !== human) {
      throw new AdapterError.InvalidAddress(human, 'address not normalized')
    }
    return human
  }

  addrCanonicalize (human: string): Uint8Array {
    if (!isBech32(human)) {
      throw new AdapterError.InvalidAddress(human, 'missing separator')
    }
    let decoded: { prefix: string, words: number[] }
    try {
      decoded = bech32.decode(human)
    } catch (e) {
      throw new AdapterError.InvalidAddress(human, displayError(e))
    }
    if (decoded.prefix !== this.prefix) {
      throw new AdapterError.InvalidAddress(human, `wrong prefix ${decoded.prefix}`)
    }
    return bech32.fromWords(decoded.words)
  }

  addrHumanize (canonical: Uint8Array): Address {
    return bech32.encode(this.prefix, bech32.toWords(canonical))
  }

  /** Deterministic valid address derived from an arbitrary string. */
  addrMake (input: string): Address {
    return this.addrHumanize(sha256(new TextEncoder().encode(input)))
  }

  debug (message: string): void {
    log.debug(bold('debug:'), message)
  }

}

const isBech32 = (value: string): value is `${string}1${string}` =>
  value.includes('1')

/** Raw querier with bank balances, a wasm handler and an optional custom query handler. */
export class MockQuerier<Q = Empty> implements Querier {

  balances = new Map<Address, Coin[]>()

  wasmHandler: (query: WasmQuery) => SystemResult = query => {
    const [kind] = Object.keys(query)
    return { Err: { unsupported_request: { kind: `wasm ${kind}` } } }
  }

  /** Wasm query handlers of individual contracts, tried before `wasmHandler`. */
  contracts = new Map<Address, (query: WasmQuery) => SystemResult>()

  customHandler: (query: Q) => SystemResult = () =>
    ({ Err: { unsupported_request: { kind: 'custom' } } })

  constructor (balances: Record<Address, Coin[]> = {}) {
    for (const [address, coins] of Object.entries(balances)) this.updateBalance(address, coins)
  }

  updateBalance (address: Address, coins: Coin[]): this {
    this.balances.set(address, coins)
    return this
  }

  updateWasm (handler: (query: WasmQuery) => SystemResult): this {
    this.wasmHandler = handler
    return this
  }

  /** Answer wasm queries addressed to one contract. */
  updateContract (address: Address, handler: (query: WasmQuery) => SystemResult): this {
    this.contracts.set(address, handler)
    return this
  }

  withCustomHandler (handler: (query: Q) => SystemResult): this {
    this.customHandler = handler
    return this
  }

  rawQuery (request: Uint8Array): SystemResult {
    let parsed: QueryRequest<Q>
    try {
      parsed = fromJson<QueryRequest<Q>>(request)
    } catch (e) {
      return { Err: { invalid_request: {
        error:   `Parsing query request: ${displayError(e)}`,
        request: toBinary(request)
      } } }
    }
    return this.handleQuery(parsed)
  }

  handleQuery (request: QueryRequest<Q>): SystemResult {
    if ('bank' in request)   return this.bankQuery(request.bank)
    if ('wasm' in request)   return this.wasmQuery(request.wasm)
    if ('custom' in request) return this.customHandler(request.custom)
    const [kind] = Object.keys(request)
    return { Err: { unsupported_request: { kind } } }
  }

  protected wasmQuery (query: WasmQuery): SystemResult {
    const handler = this.contracts.get(wasmQueryAddress(query))
    return handler ? handler(query) : this.wasmHandler(query)
  }

  protected bankQuery (query: BankQuery): SystemResult {
    if ('balance' in query) {
      const { address, denom } = query.balance
      const coin = (this.balances.get(address) ?? []).find(coin=>coin.denom === denom)
      return { Ok: { Ok: toJsonBinary({ amount: coin ?? { denom, amount: '0' } }) } }
    }
    const { address } = query.all_balances
    return { Ok: { Ok: toJsonBinary({ amount: this.balances.get(address) ?? [] }) } }
  }

}

const wasmQueryAddress = (query: WasmQuery): Address =>
  ('smart' in query) ? query.smart.contract_addr
  : ('raw' in query) ? query.raw.contract_addr
  : query.contract_info.contract_addr

/** A storage, API and querier owned together, from which contexts are borrowed. */
export class OwnedDeps<Q = Empty> {

  constructor (
    readonly storage: MockStorage    = new MockStorage(),
    readonly api:     MockApi        = new MockApi(),
    readonly querier: MockQuerier<Q> = new MockQuerier<Q>(),
  ) {}

  asMut (): DepsMut<Q> {
    return { storage: this.storage, api: this.api, querier: new QuerierWrapper<Q>(this.querier) }
  }

  asRef (): Deps<Q> {
    return { storage: this.storage, api: this.api, querier: new QuerierWrapper<Q>(this.querier) }
  }

}

export function mockDependencies <Q = Empty> (
  config: AdapterConfig = defaultConfig
): OwnedDeps<Q> {
  return new OwnedDeps<Q>(new MockStorage(), new MockApi(config.addressPrefix), new MockQuerier<Q>())
}

/** Environment of a call at a fixed block. */
export function mockEnv ({
  config  = defaultConfig,
  height  = 12_345,
  time    = '1571797419879305533',
  address = new MockApi(config.addressPrefix).addrMake('contract'),
}: Partial<{ config: AdapterConfig, height: number, time: string, address: Address }> = {}): Env {
  return {
    block:       { height, time, chain_id: config.chainId },
    transaction: { index: 3 },
    contract:    { address },
  }
}

export const mockInfo = (sender: Address, funds: Coin[] = []): MessageInfo =>
  ({ sender, funds })
