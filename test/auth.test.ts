import { Request, Response, NextFunction } from 'express';
import { validateApiKey } from '../src/middleware/auth';

describe('API Key Authentication Middleware', () => {
  let mockRequest: Partial<Request>;
  let mockResponse: Partial<Response>;
  let nextFunction: NextFunction;
  let originalApiKey: string | undefined;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    mockRequest = {
      headers: {}
    };
    mockResponse = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis()
    };
    nextFunction = jest.fn();
    originalApiKey = process.env.API_KEY;
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    if (originalApiKey === undefined) {
      delete process.env.API_KEY;
    } else {
      process.env.API_KEY = originalApiKey;
    }
    errorSpy.mockRestore();
  });

  function run(): void {
    validateApiKey(mockRequest as Request, mockResponse as Response, nextFunction);
  }

  it('should return 500 if API_KEY is not configured', () => {
    delete process.env.API_KEY;

    run();

    expect(mockResponse.status).toHaveBeenCalledWith(500);
    expect(mockResponse.json).toHaveBeenCalledWith({
      error: 'Server configuration error'
    });
    expect(errorSpy).toHaveBeenCalledWith('[Auth] API_KEY not configured in environment variables');
    expect(nextFunction).not.toHaveBeenCalled();
  });

  it('should return 401 if X-API-Key header is missing', () => {
    process.env.API_KEY = 'test-api-key';

    run();

    expect(mockResponse.status).toHaveBeenCalledWith(401);
    expect(mockResponse.json).toHaveBeenCalledWith({
      error: 'Missing X-API-Key header'
    });
    expect(nextFunction).not.toHaveBeenCalled();
  });

  it('should return 403 if API key is invalid', () => {
    process.env.API_KEY = 'correct-api-key';
    mockRequest.headers = { 'x-api-key': 'wrong-api-key' };

    run();

    expect(mockResponse.status).toHaveBeenCalledWith(403);
    expect(mockResponse.json).toHaveBeenCalledWith({
      error: 'Invalid API key'
    });
    expect(nextFunction).not.toHaveBeenCalled();
  });

  it('should return 403 for a key that is a prefix of the real one', () => {
    process.env.API_KEY = 'correct-api-key';
    mockRequest.headers = { 'x-api-key': 'correct' };

    run();

    expect(mockResponse.status).toHaveBeenCalledWith(403);
    expect(nextFunction).not.toHaveBeenCalled();
  });

  it('should call next() if API key is valid', () => {
    process.env.API_KEY = 'correct-api-key';
    mockRequest.headers = { 'x-api-key': 'correct-api-key' };

    run();

    expect(nextFunction).toHaveBeenCalled();
    expect(mockResponse.status).not.toHaveBeenCalled();
    expect(mockResponse.json).not.toHaveBeenCalled();
  });

  it('should be case-sensitive for header name', () => {
    process.env.API_KEY = 'test-api-key';
    mockRequest.headers = {
      'X-API-KEY': 'test-api-key' // Wrong case
    };

    run();

    expect(mockResponse.status).toHaveBeenCalledWith(401);
    expect(nextFunction).not.toHaveBeenCalled();
  });

  it('should reject repeated header values', () => {
    process.env.API_KEY = 'test-api-key';
    mockRequest.headers = {
      'x-api-key': ['test-api-key', 'another-key']
    };

    run();

    expect(mockResponse.status).toHaveBeenCalledWith(403);
    expect(nextFunction).not.toHaveBeenCalled();
  });
});
