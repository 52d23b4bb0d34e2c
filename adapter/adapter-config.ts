/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import dotenv from 'dotenv'

/** Update `process.env` with value from `.env` file */
dotenv.config()

/** Gets adapter settings from environment. */
export class AdapterConfig {
  /** Whether to print debug output for every dispatched call. */
  debug: boolean =
    getEnvBool('CONTRACT_ADAPTER_DEBUG', ()=>false)
  /** Bech32 prefix of addresses made and validated by the mock API. */
  addressPrefix: string =
    getEnvString('CONTRACT_ADAPTER_ADDRESS_PREFIX', ()=>'mock')
  /** Chain ID reported by the mock environment. */
  chainId: string =
    getEnvString('CONTRACT_ADAPTER_CHAIN_ID', ()=>'mock-1')

  constructor (options: Partial<AdapterConfig> = {}) {
    Object.assign(this, options)
  }
}

export default new AdapterConfig()

export function getEnvString (name: string, fallback: ()=>string): string {
  const value = process.env[name]
  return (value === undefined) ? fallback() : value
}

export function getEnvBool (name: string, fallback: ()=>boolean): boolean {
  const value = process.env[name]
  if (value === undefined) return fallback()
  return !['', '0', 'false', 'no', 'off'].includes(value.trim().toLowerCase())
}
