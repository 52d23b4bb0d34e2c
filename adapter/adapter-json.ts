/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { base64 } from '@hackbg/4mat'
import type { Binary } from './adapter-base'

const encoder = new TextEncoder()

const decoder = new TextDecoder('utf-8', { fatal: true })

/** Serialize a value into UTF-8 JSON bytes. */
export function toJson (value: unknown): Uint8Array {
  // Undefined, functions and symbols have no JSON representation.
  const serialized: string|undefined = JSON.stringify(value)
  if (serialized === undefined) throw new TypeError(`Tried to serialize ${typeof value} value`)
  return encoder.encode(serialized)
}

/** Schema-less decoding of UTF-8 JSON bytes. Throws on invalid UTF-8 or JSON. */
export function fromJson <T = unknown> (data: Uint8Array): T {
  return JSON.parse(decoder.decode(data))
}

export const toBinary = (data: Uint8Array): Binary => base64.encode(data)

export const fromBinary = (data: Binary): Uint8Array => base64.decode(data)

/** Serialize a value into JSON and encode the result as Binary. */
export const toJsonBinary = (value: unknown): Binary => toBinary(toJson(value))

/** Decode Binary and parse the result as JSON. */
export const fromJsonBinary = <T = unknown> (data: Binary): T => fromJson<T>(fromBinary(data))
