export default function notMiddleware(): void {}
