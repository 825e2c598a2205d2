import { get } from 'node:http'
import { connect, createServer } from 'node:net'

/** Ask the OS for a port that is free right now. */
export async function freePort(): Promise<number> {
  const scratch = createServer()
  await new Promise<void>((resolve) => scratch.listen(0, '127.0.0.1', resolve))
  const addr = scratch.address()
  const port = addr && typeof addr === 'object' ? addr.port : 0
  await new Promise<void>((resolve) => scratch.close(() => resolve()))
  return port
}

/** Resolve with whether the promise settled within one macrotask. */
export async function settledSoon(promise: Promise<unknown>): Promise<boolean> {
  let settled = false
  promise.then(
    () => (settled = true),
    () => (settled = true)
  )
  await new Promise((resolve) => setTimeout(resolve, 20))
  return settled
}

export interface PlainResponse {
  status: number
  connection: string | undefined
  body: string
}

/** GET over a fresh connection, keeping the hop-by-hop headers fetch hides. */
export function httpGet(url: string): Promise<PlainResponse> {
  return new Promise((resolve, reject) => {
    get(url, { agent: false }, (res) => {
      let body = ''
      res.setEncoding('utf8')
      res.on('data', (chunk: string) => {
        body += chunk
      })
      res.on('end', () =>
        resolve({ status: res.statusCode ?? 0, connection: res.headers.connection, body })
      )
    }).once('error', reject)
  })
}

/** Write raw bytes on a new connection and resolve with whatever came back once it closes. */
export function sendRaw(port: number, payload: string): Promise<string> {
  return new Promise((resolve) => {
    let received = ''
    const socket = connect(port, '127.0.0.1', () => socket.write(payload))
    socket.setEncoding('utf8')
    socket.on('data', (chunk: string) => {
      received += chunk
    })
    // A reset from the server still ends the exchange.
    socket.once('error', () => socket.destroy())
    socket.once('close', () => resolve(received))
  })
}
