/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import type { AnyResult, Binary, ContractResult, Empty } from './adapter-base'
import type { Deps, DepsMut } from './adapter-deps'
import type { Env, MessageInfo, Reply } from './adapter-std'
import type { Response } from './adapter-response'

/** The single calling convention through which the simulation engine talks to contracts.
  * `C` is the custom message extension, `Q` the custom query extension. */
export interface Contract<C, Q = Empty> {
  /** Evaluates the contract's `execute` entry point. */
  execute (deps: DepsMut<Q>, env: Env, info: MessageInfo, msg: Uint8Array): AnyResult<Response<C>>
  /** Evaluates the contract's `instantiate` entry point. */
  instantiate (deps: DepsMut<Q>, env: Env, info: MessageInfo, msg: Uint8Array): AnyResult<Response<C>>
  /** Evaluates the contract's `query` entry point. */
  query (deps: Deps<Q>, env: Env, msg: Uint8Array): AnyResult<Binary>
  /** Evaluates the contract's `sudo` entry point. */
  sudo (deps: DepsMut<Q>, env: Env, msg: Uint8Array): AnyResult<Response<C>>
  /** Evaluates the contract's `reply` entry point. */
  reply (deps: DepsMut<Q>, env: Env, reply: Reply): AnyResult<Response<C>>
  /** Evaluates the contract's `migrate` entry point. */
  migrate (deps: DepsMut<Q>, env: Env, msg: Uint8Array): AnyResult<Response<C>>
}

/** Shape of `execute` and `instantiate`. */
export type ContractFn<T, C, E, Q> =
  (deps: DepsMut<Q>, env: Env, info: MessageInfo, msg: T) => ContractResult<Response<C>, E>

/** Shape of `sudo` and `migrate`, which have no sender. */
export type PermissionedFn<T, C, E, Q> =
  (deps: DepsMut<Q>, env: Env, msg: T) => ContractResult<Response<C>, E>

export type ReplyFn<C, E, Q> =
  (deps: DepsMut<Q>, env: Env, msg: Reply) => ContractResult<Response<C>, E>

export type QueryFn<T, E, Q> =
  (deps: Deps<Q>, env: Env, msg: T) => ContractResult<Binary, E>

/** Validates a decoded message. Satisfied by zod schemas, among others. */
export interface MessageSchema<T> {
  parse (data: unknown): T
}
