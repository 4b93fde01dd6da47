import axios from 'axios';
import { AxiosTransport } from '../../../src/client/lib/transport';
import { TransportError } from '../../../src/client/lib/errors';

// Mock axios, keeping the real error detection
jest.mock('axios', () => {
  const actual = jest.requireActual('axios');
  return {
    __esModule: true,
    default: {
      create: jest.fn(),
      isAxiosError: actual.isAxiosError,
    },
  };
});

describe('AxiosTransport', () => {
  const request = jest.fn();

  beforeEach(() => {
    jest.clearAllMocks();
    (axios.create as jest.Mock).mockReturnValue({ request });
  });

  it('should create an axios instance that hands back every status as text', () => {
    new AxiosTransport({ timeout: 5000 });

    expect(axios.create).toHaveBeenCalledWith({
      timeout: 5000,
      headers: {},
      validateStatus: expect.any(Function),
      responseType: 'text',
      transformResponse: [expect.any(Function)],
    });

    const [config] = (axios.create as jest.Mock).mock.calls[0];
    expect(config.validateStatus(500)).toBe(true);
    expect(config.transformResponse[0]('{"raw":true}')).toBe('{"raw":true}');
  });

  it('should default the timeout to ten seconds', () => {
    new AxiosTransport();

    expect(axios.create).toHaveBeenCalledWith(expect.objectContaining({ timeout: 10000 }));
  });

  it('should send the request and return status and body', async () => {
    request.mockResolvedValueOnce({ status: 400, data: '{"error":{"msg":"bad","code":400}}' });
    const transport = new AxiosTransport();

    const response = await transport.send({
      method: 'POST',
      url: 'http://localhost:8983/solr/users/update?commit=true&wt=json',
      headers: { 'Content-Type': 'application/json' },
      body: '[{"id":"1"}]',
    });

    expect(response).toEqual({ status: 400, body: '{"error":{"msg":"bad","code":400}}' });
    expect(request).toHaveBeenCalledWith({
      method: 'POST',
      url: 'http://localhost:8983/solr/users/update?commit=true&wt=json',
      headers: { 'Content-Type': 'application/json' },
      data: '[{"id":"1"}]',
    });
  });

  it('should return an empty body when no text came back', async () => {
    request.mockResolvedValueOnce({ status: 204, data: undefined });
    const transport = new AxiosTransport();

    const response = await transport.send({ method: 'GET', url: 'http://localhost/solr', headers: {} });

    expect(response).toEqual({ status: 204, body: '' });
  });

  it('should turn network errors into a TransportError', async () => {
    const networkError = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:8983'), {
      isAxiosError: true,
      code: 'ECONNREFUSED',
    });
    request.mockRejectedValueOnce(networkError);
    const transport = new AxiosTransport();

    const error = await transport
      .send({ method: 'GET', url: 'http://localhost:8983/solr', headers: {} })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: 'connect ECONNREFUSED 127.0.0.1:8983',
      code: 'ECONNREFUSED',
      cause: networkError,
    });
  });

  it('should wrap any other failure', async () => {
    request.mockRejectedValueOnce(new Error('Request setup failed'));
    const transport = new AxiosTransport();

    await expect(
      transport.send({ method: 'GET', url: 'http://localhost:8983/solr', headers: {} }),
    ).rejects.toMatchObject({ name: 'TransportError', message: 'Request setup failed' });
  });
});
