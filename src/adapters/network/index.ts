export { TcpPortProbe, DEFAULT_PROBE_HOSTS, type TcpPortProbeOptions } from "./tcp-port-probe"
