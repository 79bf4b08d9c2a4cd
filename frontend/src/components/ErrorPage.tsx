import { Layout } from "./Layout";

interface Props {
  status: number;
  message: string;
}

export function ErrorPage({ status, message }: Props) {
  return (
    <Layout title={`Error ${status}`}>
      <div className="bg-white rounded-xl border border-red-200 p-6">
        <h1 className="text-lg font-semibold text-red-700 mb-2">Error {status}</h1>
        <p className="text-sm text-gray-700">{message}</p>
        <a href="/" className="inline-block mt-4 text-sm text-blue-600">
          Back to tasks
        </a>
      </div>
    </Layout>
  );
}
