import { renderToStaticMarkup } from "react-dom/server";
import { ErrorPage } from "./components/ErrorPage";
import { IndexPage, type IndexPageProps } from "./components/IndexPage";

const DOCTYPE = "<!DOCTYPE html>";

export function renderIndexPage(props: IndexPageProps): string {
  return DOCTYPE + renderToStaticMarkup(<IndexPage {...props} />);
}

export function renderErrorPage(status: number, message: string): string {
  return DOCTYPE + renderToStaticMarkup(<ErrorPage status={status} message={message} />);
}
