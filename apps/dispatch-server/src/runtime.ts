/** The part of `node:http` Server the runtime drives. */
export type ListeningServer = {
  readonly listening: boolean
  once(event: 'error', listener: (error: Error) => void): unknown
  off(event: 'error', listener: (error: Error) => void): unknown
  listen(port: number, host: string, callback: () => void): unknown
  close(callback: (error?: Error) => void): unknown
  closeIdleConnections(): void
}

export const createServerRuntime = <TServer extends ListeningServer>({
  server,
  host,
  port
}: {
  server: TServer
  host: string
  port: number
}) => {
  const start = async () =>
    new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(port, host, () => {
        server.off('error', reject)
        resolve()
      })
    })

  // Idle keep-alive sockets would otherwise hold close() open until they time out.
  const stop = async () =>
    new Promise<void>((resolve, reject) => {
      if (!server.listening) {
        resolve()
        return
      }

      server.close(error => {
        if (error) {
          reject(error)
          return
        }
        resolve()
      })
      server.closeIdleConnections()
    })

  return {
    server,
    start,
    stop
  }
}
