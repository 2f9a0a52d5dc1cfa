import {
  encodeSigstoreVerificationInputV1,
  encodeSigstoreVerificationInputV2
} from './encoder'
import { SigstoreVerificationInputV1 } from './models'
import {
  parseSigstoreVerificationInputV1,
  parseSigstoreVerificationInputV2
} from './parser'

jest.mock('@actions/core')

describe('encodeSigstoreVerificationInputV1', () => {
  it('should tag the request externally', () => {
    const result = encodeSigstoreVerificationInputV1({
      type: 'SigstorePubKeyVerify',
      image: 'reg/busybox:1.0.0',
      pub_keys: ['PEM1'],
      annotations: null
    })
    expect(result).toBe(
      '{"SigstorePubKeyVerify":{"image":"reg/busybox:1.0.0","pub_keys":["PEM1"],"annotations":null}}'
    )
  })

  it('should be read back by the V1 parser', () => {
    const input: SigstoreVerificationInputV1 = {
      type: 'SigstoreKeylessVerify',
      image: 'reg/busybox:1.0.0',
      keyless: [
        { issuer: 'https://issuer.example.com', subject: 'user@example.com' }
      ],
      annotations: { env: 'prod' }
    }

    expect(
      parseSigstoreVerificationInputV1(encodeSigstoreVerificationInputV1(input))
    ).toEqual(input)
  })
})

describe('encodeSigstoreVerificationInputV2', () => {
  it('should tag the request internally with a leading type field', () => {
    const result = encodeSigstoreVerificationInputV2({
      type: 'SigstoreKeylessPrefixVerify',
      image: 'reg/app:1',
      keyless_prefix: [
        {
          issuer: 'https://token.actions.githubusercontent.com',
          url_prefix: 'https://github.com/octocat/'
        }
      ],
      annotations: { env: 'prod' }
    })
    expect(result).toBe(
      '{"type":"SigstoreKeylessPrefixVerify","image":"reg/app:1","keyless_prefix":[{"issuer":"https://token.actions.githubusercontent.com","url_prefix":"https://github.com/octocat/"}],"annotations":{"env":"prod"}}'
    )
  })

  it('should write an absent repo as null', () => {
    const result = encodeSigstoreVerificationInputV2({
      type: 'SigstoreGithubActionsVerify',
      image: 'reg/app:latest',
      owner: 'octocat',
      repo: null,
      annotations: null
    })
    expect(result).toBe(
      '{"type":"SigstoreGithubActionsVerify","image":"reg/app:latest","owner":"octocat","repo":null,"annotations":null}'
    )
    expect(parseSigstoreVerificationInputV2(result)).toEqual({
      type: 'SigstoreGithubActionsVerify',
      image: 'reg/app:latest',
      owner: 'octocat',
      repo: null,
      annotations: null
    })
  })
})
