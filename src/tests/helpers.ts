import http from 'node:http'
import type { HttpRequest, HttpTransport, Output } from '../sender'

export class RecordingOutput implements Output {
  public stdout: string[] = []
  public stderr: string[] = []
  log(message: string): void {
    this.stdout.push(message)
  }
  error(message: string): void {
    this.stderr.push(message)
  }
}

export function stubTransport(status: number, body: string): { transport: HttpTransport; requests: HttpRequest[] } {
  const requests: HttpRequest[] = []
  return {
    requests,
    transport: async (request) => {
      requests.push(request)
      return { status, body }
    },
  }
}

export function listen(server: http.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject)
    server.listen(0, '127.0.0.1', () => {
      const address = server.address()
      if (address === null || typeof address === 'string') {
        reject(new Error('Server is not listening on a TCP port'))
        return
      }
      resolve(address.port)
    })
  })
}

export function close(server: http.Server): Promise<void> {
  server.closeAllConnections()
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()))
  })
}
