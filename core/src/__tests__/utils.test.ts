import { PrivateKey } from '@bsv/sdk'
import {
  SafeMath,
  addressFromLabel,
  addressFromPublicKey,
  deriveContractAddress,
  formatUnits,
  isAddress,
  isZeroAddress,
  parseUnits,
  validateAddress,
  validateAmount
} from '../utils.js'
import { LedgerError, formatLedgerError, isLedgerError } from '../errors.js'
import { isLoggingEnabled, logWithTimestamp, setLoggingConfig } from '../logging.js'
import { MAX_UINT256, ZERO_ADDRESS } from '../constants.js'
import { errorCodeOf } from './helpers.js'

describe('utils', () => {
  describe('addresses', () => {
    it('should derive stable 20-byte hex addresses', () => {
      const address = deriveContractAddress(addressFromLabel('deployer'), 0)

      expect(isAddress(address)).toBe(true)
      expect(deriveContractAddress(addressFromLabel('deployer'), 0)).toBe(address)
      expect(deriveContractAddress(addressFromLabel('deployer'), 1)).not.toBe(address)
    })

    it('should derive an address from a public key', () => {
      const publicKey = new PrivateKey(1).toPublicKey()

      expect(isAddress(addressFromPublicKey(publicKey))).toBe(true)
      expect(addressFromPublicKey(publicKey)).toBe(addressFromPublicKey(new PrivateKey(1).toPublicKey()))
    })

    it('should recognise the null address', () => {
      expect(isZeroAddress(ZERO_ADDRESS)).toBe(true)
      expect(isZeroAddress(addressFromLabel('alice'))).toBe(false)
    })

    it('should only accept 40 lowercase hex characters', () => {
      expect(() => validateAddress(addressFromLabel('alice'))).not.toThrow()
      expect(errorCodeOf(() => validateAddress('abc'))).toBe('InvalidAddress')
      expect(errorCodeOf(() => validateAddress('AB'.repeat(20)))).toBe('InvalidAddress')
    })
  })

  describe('amounts', () => {
    it('should keep amounts inside the uint256 domain', () => {
      expect(() => validateAmount(0n)).not.toThrow()
      expect(() => validateAmount(MAX_UINT256)).not.toThrow()
      expect(errorCodeOf(() => validateAmount(-1n))).toBe('InvalidAmount')
      expect(errorCodeOf(() => validateAmount(MAX_UINT256 + 1n))).toBe('InvalidAmount')
    })

    it('should check arithmetic', () => {
      expect(SafeMath.add(2n, 3n)).toBe(5n)
      expect(SafeMath.sub(5n, 3n)).toBe(2n)
      expect(SafeMath.mul(4n, 3n)).toBe(12n)
      expect(SafeMath.div(7n, 2n)).toBe(3n)
      expect(errorCodeOf(() => SafeMath.add(MAX_UINT256, 1n))).toBe('Overflow')
      expect(errorCodeOf(() => SafeMath.sub(1n, 2n))).toBe('Overflow')
      expect(errorCodeOf(() => SafeMath.mul(MAX_UINT256, 2n))).toBe('Overflow')
      expect(errorCodeOf(() => SafeMath.div(1n, 0n))).toBe('UndefinedValue')
    })

    it('should format raw amounts with decimals', () => {
      expect(formatUnits(1_500_000_000_000_000_000n, 18)).toBe('1.5')
      expect(formatUnits(5n, 2)).toBe('0.05')
      expect(formatUnits(100n, 2)).toBe('1')
      expect(formatUnits(42n, 0)).toBe('42')
    })

    it('should parse display amounts', () => {
      expect(parseUnits('1.5', 18)).toBe(1_500_000_000_000_000_000n)
      expect(parseUnits('12', 2)).toBe(1_200n)
      expect(errorCodeOf(() => parseUnits('0.001', 2))).toBe('InvalidAmount')
      expect(errorCodeOf(() => parseUnits('1,5', 2))).toBe('InvalidAmount')
    })
  })
})

describe('errors', () => {
  it('should carry a code and default the message to it', () => {
    const error = new LedgerError('NotAdded')

    expect(error.name).toBe('LedgerError')
    expect(error.code).toBe('NotAdded')
    expect(error.message).toBe('NotAdded')
    expect(isLedgerError(error)).toBe(true)
    expect(isLedgerError(error, 'NotAdded')).toBe(true)
    expect(isLedgerError(error, 'Locked')).toBe(false)
    expect(isLedgerError(new Error('NotAdded'))).toBe(false)
  })

  it('should keep the cause', () => {
    const cause = new Error('refused')
    expect(new LedgerError('TransferFailed', 'payout failed', { cause }).cause).toBe(cause)
  })

  it('should format errors for display', () => {
    expect(formatLedgerError(new LedgerError('SameBlockReplay')))
      .toBe('Only one transaction per block is allowed. Please try again in the next block.')
    expect(formatLedgerError(new LedgerError('NotAdded', 'No liquidity has been added'))).toBe('No liquidity has been added')
    expect(formatLedgerError(new Error('boom'))).toBe('boom')
    expect(formatLedgerError(new Error('{"status":500}'))).toBe('Something went wrong!')
    expect(formatLedgerError(undefined)).toBe('Something went wrong!')
    expect(formatLedgerError(null, 'Try again')).toBe('Try again')
  })
})

describe('logging', () => {
  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('should honour per-file switches', () => {
    setLoggingConfig({ 'utils.test': true, 'utils.test.quiet': false })

    expect(isLoggingEnabled('utils.test')).toBe(true)
    expect(isLoggingEnabled('utils.test.quiet')).toBe(false)
  })

  it('should print timestamped lines with inspected objects', () => {
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined)
    setLoggingConfig({ 'utils.test': true, 'utils.test.quiet': false })

    logWithTimestamp('utils.test', 'reserve', { amount: 1n })
    logWithTimestamp('utils.test.quiet', 'hidden')

    expect(spy).toHaveBeenCalledTimes(1)
    expect(spy.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T.*\] \[\d+\.\d{3}s\] \[utils\.test\]$/)
    expect(spy.mock.calls[0].slice(1)).toEqual(['reserve', '{ amount: 1n }'])
  })
})
