import { createTransport, type Transporter } from "nodemailer"
import type StreamTransport from "nodemailer/lib/stream-transport"

/**
 * A real nodemailer transporter that builds the message in memory instead
 * of opening a connection.
 */
export function createSmtpTestClient(): Transporter<StreamTransport.SentMessageInfo> {
  return createTransport({
    streamTransport: true,
    newline: "unix",
    buffer: true,
  })
}
