// 串口信息 (SerialPort.list 的结果)
export interface PortInfo {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
  pnpId?: string;
  locationId?: string;
  productId?: string;
  vendorId?: string;
}

// 已知串口及其探测状态 (用于列表展示)
export interface KnownPortView {
  path: string;
  pending: boolean;
}
