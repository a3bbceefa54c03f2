// Port configuration
// 3109 serves the read-only status API; set STATUS_API_PORT to move it
export const PORTS = {
    statusApi: Number(process.env.STATUS_API_PORT ?? "3109"),
  };
