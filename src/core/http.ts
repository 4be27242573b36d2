import axios, { type AxiosInstance } from 'axios';

export const createHttpClient = (baseURL: string, timeoutMs = 10000): AxiosInstance => {
  return axios.create({
    baseURL,
    timeout: timeoutMs
  });
};

/** Single attempt; callers that need delivery guarantees add their own retry. */
export const postJson = async <TReq, TRes>(
  client: AxiosInstance,
  path: string,
  body: TReq,
  headers?: Record<string, string>
): Promise<TRes> => {
  const res = await client.post<TRes>(path, body, { headers });
  return res.data;
};
