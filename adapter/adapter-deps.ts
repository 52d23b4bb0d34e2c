/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import type { Address, Binary, Empty } from './adapter-base'
import type { Coin, QueryRequest, SystemResult } from './adapter-std'
import { AdapterError, displayError } from './adapter-base'
import { toJson, toJsonBinary, toBinary, fromBinary, fromJsonBinary } from './adapter-json'

export type Order = 'ascending'|'descending'

/** Key/value pair yielded by storage iteration. */
export type StorageRecord = [key: Uint8Array, value: Uint8Array]

/** Storage as seen by queries. */
export interface ReadonlyStorage {
  get (key: Uint8Array): Uint8Array|null
  /** Iterate over keys in `[start, end)`; `null` leaves that bound open. */
  range (start: Uint8Array|null, end: Uint8Array|null, order: Order): Iterable<StorageRecord>
}

/** Storage as seen by state-changing entry points. */
export interface Storage extends ReadonlyStorage {
  set (key: Uint8Array, value: Uint8Array): void
  remove (key: Uint8Array): void
}

/** Host functions available to a contract. */
export interface Api {
  addrValidate (human: string): Address
  addrCanonicalize (human: string): Uint8Array
  addrHumanize (canonical: Uint8Array): Address
  debug (message: string): void
}

/** Raw, byte-level interface for querying the chain and other contracts. */
export interface Querier {
  rawQuery (request: Uint8Array): SystemResult
}

/** Typed querying on top of a raw querier. `Q` is the custom query extension. */
export class QuerierWrapper<Q = Empty> {

  constructor (readonly querier: Querier) {}

  /** Make a query and return the undecoded response. */
  queryBinary (request: QueryRequest<Q>): Binary {
    const result = this.querier.rawQuery(toJson(request))
    if ('Err' in result) {
      throw new AdapterError.Query(`system error: ${JSON.stringify(result.Err)}`)
    }
    const response = result.Ok
    if ('Err' in response) {
      throw new AdapterError.Query(`contract error: ${response.Err}`)
    }
    return response.Ok
  }

  /** Make a query and parse the JSON response. */
  query <T> (request: QueryRequest<Q>): T {
    const response = this.queryBinary(request)
    try {
      return fromJsonBinary<T>(response)
    } catch (e) {
      throw new AdapterError.Query(`invalid response: ${displayError(e)}`)
    }
  }

  querySmart <T> (contractAddr: Address, msg: unknown): T {
    return this.query<T>({ wasm: { smart: { contract_addr: contractAddr, msg: toJsonBinary(msg) } } })
  }

  /** Read a key from another contract's storage. Missing keys yield `null`. */
  queryRaw (contractAddr: Address, key: Uint8Array): Uint8Array|null {
    const value = fromBinary(this.queryBinary({
      wasm: { raw: { contract_addr: contractAddr, key: toBinary(key) } }
    }))
    return (value.length > 0) ? value : null
  }

  queryBalance (address: Address, denom: string): Coin {
    return this.query<{ amount: Coin }>({ bank: { balance: { address, denom } } }).amount
  }

  queryAllBalances (address: Address): Coin[] {
    return this.query<{ amount: Coin[] }>({ bank: { all_balances: { address } } }).amount
  }

}

/** Shared, read-only execution context, passed to `query`. */
export interface Deps<Q = Empty> {
  readonly storage: ReadonlyStorage
  readonly api:     Api
  readonly querier: QuerierWrapper<Q>
}

/** Exclusive, mutable execution context, passed to state-changing entry points. */
export interface DepsMut<Q = Empty> {
  readonly storage: Storage
  readonly api:     Api
  readonly querier: QuerierWrapper<Q>
}

/** View a mutable context as a read-only one. */
export const asRef = <Q> ({ storage, api, querier }: DepsMut<Q>): Deps<Q> =>
  ({ storage, api, querier })
