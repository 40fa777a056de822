export interface RunningListener<THandle> {
  handle: THandle;
  port: number;
  // How the bound address is printed, e.g. `:8080` when bound on all interfaces.
  listenAddress: string;
  // Rejects with an `ERR_NC_LISTEN` error once the listener stops serving, whatever the
  // reason. It never resolves.
  closed: Promise<void>;
  // Stops the listener; the rejection of `closed` it causes is consumed here.
  close: () => Promise<void>;
}
