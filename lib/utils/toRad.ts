export const toRad = (deg: number) => (deg * Math.PI) / 180
