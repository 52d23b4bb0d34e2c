/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import type { Binary, ContractResult, Empty } from './adapter-base'
import type { CosmosMsg, Env, MessageInfo, Reply } from './adapter-std'
import type { ContractFn, PermissionedFn, QueryFn, ReplyFn } from './adapter-contract'
import { AdapterConsole, AdapterError, bold } from './adapter-base'
import { QuerierWrapper } from './adapter-deps'
import type { Deps, DepsMut } from './adapter-deps'
import { Response, SubMsg } from './adapter-response'

const log = new AdapterConsole('ContractWrapper: customize')

/** Adapt an `execute` or `instantiate` written against the baseline environment. */
export function customizeContractFn <T, C, E, Q> (
  rawFn: ContractFn<T, Empty, E, Empty>
): ContractFn<T, C, E, Q> {
  return (deps: DepsMut<Q>, env: Env, info: MessageInfo, msg: T) =>
    mapOk(rawFn(decustomizeDepsMut(deps), env, info, msg), customizeResponse<C>)
}

export function customizeQueryFn <T, E, Q> (
  rawFn: QueryFn<T, E, Empty>
): QueryFn<T, E, Q> {
  return (deps: Deps<Q>, env: Env, msg: T): ContractResult<Binary, E> =>
    rawFn(decustomizeDeps(deps), env, msg)
}

/** Adapt a `sudo` or `migrate` written against the baseline environment. */
export function customizePermissionedFn <T, C, E, Q> (
  rawFn: PermissionedFn<T, Empty, E, Empty>
): PermissionedFn<T, C, E, Q> {
  return (deps: DepsMut<Q>, env: Env, msg: T) =>
    mapOk(rawFn(decustomizeDepsMut(deps), env, msg), customizeResponse<C>)
}

export function customizeReplyFn <C, E, Q> (
  rawFn: ReplyFn<Empty, E, Empty>
): ReplyFn<C, E, Q> {
  return (deps: DepsMut<Q>, env: Env, msg: Reply) =>
    mapOk(rawFn(decustomizeDepsMut(deps), env, msg), customizeResponse<C>)
}

/** Drop the custom query extension from a mutable context.
  * Storage and API are passed by reference. */
export function decustomizeDepsMut <Q> (deps: DepsMut<Q>): DepsMut<Empty> {
  return {
    storage: deps.storage,
    api:     deps.api,
    querier: new QuerierWrapper<Empty>(deps.querier.querier),
  }
}

/** Drop the custom query extension from a read-only context. Storage stays read-only. */
export function decustomizeDeps <Q> (deps: Deps<Q>): Deps<Empty> {
  return {
    storage: deps.storage,
    api:     deps.api,
    querier: new QuerierWrapper<Empty>(deps.querier.querier),
  }
}

/** Lift a baseline response into one with custom message extension `C`. */
export function customizeResponse <C> (response: Response<Empty>): Response<C> {
  const customized = new Response<C>()
    .addSubmessages(response.messages.map(msg=>customizeMsg<C>(msg)))
    .addEvents(response.events)
    .addAttributes(response.attributes)
  customized.data = response.data
  return customized
}

/** Lift a baseline sub-message, keeping its ID, gas limit, reply policy and payload. */
export function customizeMsg <C> (msg: SubMsg<Empty>): SubMsg<C> {
  return new SubMsg<C>(
    customizeCosmosMsg<C>(msg.msg), msg.id, msg.reply_on, msg.gas_limit, msg.payload
  )
}

/** Exhaustive over the variants of CosmosMsg. The two failure cases are thrown
  * instead of returned: they are invariant violations, and are meant to abort the
  * whole simulated transaction rather than be handled as a contract error. */
function customizeCosmosMsg <C> (msg: CosmosMsg<Empty>): CosmosMsg<C> {
  if (typeof msg !== 'object' || msg === null) return unknownVariant(msg)
  if ('wasm' in msg)         return { wasm: msg.wasm }
  if ('bank' in msg)         return { bank: msg.bank }
  if ('staking' in msg)      return { staking: msg.staking }
  if ('distribution' in msg) return { distribution: msg.distribution }
  if ('ibc' in msg)          return { ibc: msg.ibc }
  if ('stargate' in msg)     return { stargate: msg.stargate }
  if ('custom' in msg) {
    log.error(bold('Invariant violation:'), 'custom message in baseline response')
    throw new AdapterError.Unreachable()
  }
  return unknownVariant(msg)
}

function unknownVariant (msg: unknown): never {
  const shown = String(JSON.stringify(msg))
  log.error(bold('Invariant violation:'), 'unknown message variant', shown)
  throw new AdapterError.UnknownVariant(shown)
}

const mapOk = <T, U, E> (result: ContractResult<T, E>, fn: (value: T) => U): ContractResult<U, E> =>
  ('Ok' in result) ? { Ok: fn(result.Ok) } : result
